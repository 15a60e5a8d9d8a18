export {
  SourceResolver,
  CommandRunner,
  LocalSourceResolver,
  GitSourceResolver,
  createSourceResolver,
  DEFAULT_CLONE_TIMEOUT_MS,
  isRemoteLocator,
} from './SourceResolver';
