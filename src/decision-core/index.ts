// decision-core: policy, governance, advisory, human gate and audit ledger.
// No HTTP; the only I/O is the file ledger and the policy pack loader.

export * from './errors';
export * from './claim-input';
export * from './predicates';
export * from './policy-pack';
export * from './boundaries';
export * from './state-machine';
export * from './advisory';
export * from './governance';
export * from './rule-model';
export * from './human-gate';
export * from './ledger';
export { FileAuditLedger } from './file-ledger';
export { PolicyMutationError, lockPolicy } from './immutable';
export { TimeoutError, withTimeout } from './timeout';
export * from './engine';
export * from './scenarios/claims';
export * from './runner';
export * from './metrics';
