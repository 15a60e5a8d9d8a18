export { FileIndexer, FileIndexerOptions } from './FileIndexer';
