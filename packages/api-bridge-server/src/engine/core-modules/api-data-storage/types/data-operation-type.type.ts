export const DATA_OPERATION_TYPES = ['create_session', 'store_data'] as const;

export type DataOperationType = (typeof DATA_OPERATION_TYPES)[number];
