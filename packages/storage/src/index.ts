/**
 * @postpress/storage
 */

export { FileStorage, type FileStorageOptions } from './file-storage.js';
