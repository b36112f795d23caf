export type TransportFailureKind = 'timeout' | 'connection_error' | 'other';
