/**
 * @seedsync/library
 *
 * Library manager integration
 */

export {
  LibraryClient,
  DEFAULT_LIBRARY_HOST,
  type LibraryClientConfig,
  type LibraryClientOptions,
  type Series,
  type RootFolder,
  type ImportTrigger,
} from './libraryClient.js';
