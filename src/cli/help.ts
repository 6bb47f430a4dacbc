export const MAIN_USAGE = `hn-keywords: rank the most frequent keywords in popular Hacker News titles

Usage:
  hn-keywords <stories.json> [options]

Arguments:
  <stories.json>           JSON dump with a "stories" array

Options:
  --limit <n>              Number of keywords to report (default: 100)
  --stop-words <file>      JSON array of words to ignore (default: bundled list)
  --log <file>             Write the run log to a file instead of stderr
  --help, -h               Show this help message`;
