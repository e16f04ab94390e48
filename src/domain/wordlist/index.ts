export {
  filterWordlistLines,
  parseWordlist,
  analyzeWordlist,
  wordlistWarnings,
  RECOMMENDED_MIN_WORDS,
  type WordlistStats,
} from './wordlist.js';
