export { PendingRequestTable } from './pending-request-table.js';
export type { ReplyChannel, PendingEntry, PendingRequestEvents } from './pending-request-table.js';
