// ASCII punctuation: !"#$%&'()*+,-./:;<=>?@[\]^_`{|}~
const PUNCTUATION = /[!-\/:-@\[-`{-~]/g;

export function cleanTitle(title: string): string {
  return title.toLowerCase().replace(PUNCTUATION, '');
}

/** Lazily yields cleaned titles; single pass. */
export function* cleanTitles(titles: Iterable<string>): Generator<string, void, undefined> {
  for (const title of titles) {
    yield cleanTitle(title);
  }
}
