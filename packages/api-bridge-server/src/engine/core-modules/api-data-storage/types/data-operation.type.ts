import { type DataOperationType } from 'src/engine/core-modules/api-data-storage/types/data-operation-type.type';

export type DataOperation = {
  id: number;
  sessionId: string;
  operationType: DataOperationType;
  recordsAffected: number;
  details: string | null;
  createdAt: Date;
};
