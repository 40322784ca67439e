// Store contract + in-memory store
export type { ContractNegotiationStore, LeaseRequest, StoreResult } from './store/types.js';
export { InMemoryNegotiationStore } from './store/in-memory.js';
export type { InMemoryStoreOptions } from './store/in-memory.js';
export { applyQuery, matchesCriterion, resolvePath } from './store/query.js';

// Commands
export type { ContractNegotiationCommand } from './commands/types.js';
export { cancelCommand, declineCommand } from './commands/types.js';
export { CommandQueue } from './commands/queue.js';

// Dispatch
export type { DispatchResult, MessageDispatcher } from './dispatch/types.js';

// Managers
export type { ManagerConfig } from './manager/config.js';
export { DEFAULT_MANAGER_CONFIG } from './manager/config.js';
export type { ManagerDependencies } from './manager/manager.js';
export { NegotiationManager } from './manager/manager.js';
export { ConsumerNegotiationManager } from './manager/consumer.js';
export { ProviderNegotiationManager } from './manager/provider.js';
export { RetryTracker } from './manager/retry.js';
export type { RetryPolicy } from './manager/retry.js';

// Service
export { ContractNegotiationService } from './service/negotiation.service.js';

// Ambient
export type { TransactionContext } from './transaction.js';
export { NoopTransactionContext } from './transaction.js';
export type { Logger, LoggerOptions } from './logger.js';
export { createLogger } from './logger.js';
