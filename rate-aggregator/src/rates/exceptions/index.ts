export { InsufficientDataException } from './insufficient-data.exception';
export { RateNotFoundException } from './rate-not-found.exception';
export { StorageException } from './storage.exception';
