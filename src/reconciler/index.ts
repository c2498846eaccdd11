export { reconcile, selectBackgroundBox, frameFromBox } from './bbox-reconciler.js';
export type { BoxMap, CanonicalFrame, ReconcileInput, Reconciliation } from './bbox-reconciler.js';
