export * from './types';
export { ProjectStack } from './stack/project-stack';
export { StackPreconditionError, StackTimeoutError } from './stack/errors';
export { StateOwner, DEFAULT_TIMEOUT_MS, type Transition } from './state/state-owner';
export {
  ProcessWorkingDirectory,
  VirtualWorkingDirectory,
  type WorkingDirectory,
} from './workspace/working-directory';
export { loadConfig, getDefaultConfig, saveConfig, type PstackConfig, type LogConfig } from './utils/config';
export { ValidationError, parseOverride, parseOverrides } from './utils/validators';
export { loadManifest, parseManifest, type ProjectManifest } from './walker/manifest';
export { TreeWalker, WalkEventType, type WalkEvent, type WalkOptions } from './walker/tree-walker';
export { default as logger, addFileTransport, setLogLevel } from './utils/logger';
