export const StorageErrors = {
  STORAGE_READ_FAILED: {
    code: 'STORAGE_READ_FAILED',
    message: 'Data file could not be read.',
  },
  STORAGE_WRITE_FAILED: {
    code: 'STORAGE_WRITE_FAILED',
    message: 'Data file could not be written.',
  },
  STORAGE_CORRUPTED: {
    code: 'STORAGE_CORRUPTED',
    message: 'Data file does not contain a valid collection.',
  },
};
