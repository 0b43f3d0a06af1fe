export { createRemoteSync } from './remote-sync';
export { buildPushBody, readSetpointField } from './helpers';
export type { FetchFn, RemoteSync, RemoteSyncConfig, RemoteSyncDependencies, SetpointField } from './types';
