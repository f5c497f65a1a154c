/**
 * Replica facade and editing sessions
 * @module replica
 */

export { Replica, type ReplicaOptions, type CommitResult } from './replica.js';
export { EditSession, type EditSessionStatus, type Committer } from './edit-session.js';
