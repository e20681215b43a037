/**
 * Reconciliation Module
 */

export {
  reconcile,
  isHighQualityImage,
  shouldReplaceImage,
  shouldReplaceText,
  CONTENT_REPLACE_MARGIN,
  type ReconcileDecision,
  type ReconcileOptions,
} from './engine.js';

export { commitDecision, type CommitOutcome } from './commit.js';
