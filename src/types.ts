export interface Config {
  dictionaryDir: string;
  maxSuggestions: number;
  maxTokenLength: number;
  editDistance: boolean;
  debug: boolean;
  checkOnly: boolean;
}

export interface ParseResult {
  config: Config;
  words: string[];
}

export interface WordReport {
  word: string;
  isCorrect: boolean;
  suggestions: string[];
}
