export {
  normalizeRelativeDate,
  isValidTimezone,
} from './normalizer.js';

export type { NormalizeDateOptions } from './normalizer.js';
