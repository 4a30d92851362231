// Temporal Value Model

export {
  parseTimeScoped,
  parseDateBound,
  toInstant,
  toTimestamp,
  type ParsedTimeScoped,
  type DateBound,
} from './parse.js';

export {
  isActiveAt,
  compareValidFrom,
  sortHistory,
  activeValue,
  activeValues,
} from './activity.js';
