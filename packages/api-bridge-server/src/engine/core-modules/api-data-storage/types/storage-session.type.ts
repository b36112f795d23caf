export type StorageSession = {
  id: string;
  name: string;
  description: string | null;
  apiName: string;
  endpointName: string;
  fileName: string;
  totalRecords: number;
  createdAt: Date;
  updatedAt: Date;
  lastOperationAt: Date | null;
};

export type CreateStorageSessionInput = {
  name: string;
  apiName: string;
  endpointName: string;
  description?: string | null;
};
