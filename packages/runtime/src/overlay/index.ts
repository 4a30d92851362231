export {
  applyChangeRecords,
  orderChangeRecords,
  type ApplyChangeRecordsOptions,
  type DatedRecord,
  type OverlayResult,
  type SkippedRecord,
} from './overlay.js';
