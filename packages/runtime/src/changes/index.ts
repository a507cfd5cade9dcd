export { applyMergePatch, isPlainObject } from './merge.js';
export { KeyedLock } from './keyed-lock.js';
export { planTransition, stateOf, type AspectState, type TransitionPlan } from './transitions.js';
export {
  createChangeProcessor,
  isChangeError,
  type ChangeError,
  type ChangeOutcome,
  type ChangeProcessor,
  type ChangeProcessorOptions,
  type ChangeResult,
  type IndexDelivery,
  type IndexSink,
  type SettledChange,
} from './processor.js';
