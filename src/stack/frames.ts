import * as fs from 'node:fs';
import {
  type FrameView,
  type ProjectConfig,
  type ProjectFrame,
  type Stack,
} from '../types';
import { StackPreconditionError } from './errors';

export function createFrame(
  name: string | null,
  config: ProjectConfig,
  file: string,
  stack: Stack,
): ProjectFrame {
  return {
    name,
    config,
    file,
    position: stack.length,
    recursing: false,
    // The first project never needs announcing: nothing else has taken over the output yet.
    ioDone: stack.length === 0,
    configApps: [],
    configFiles: [file],
    configMtime: null,
  };
}

export function toView(frame: ProjectFrame): FrameView {
  return {
    name: frame.name,
    config: frame.config,
    file: frame.file,
    position: frame.position,
  };
}

/** Defining file of the frame already registered under `name`, if any. */
export function findProjectNamed(name: string | null, stack: Stack): string | undefined {
  if (name === null) {
    return undefined;
  }
  return stack.find((frame) => frame.name === name)?.file;
}

/** Returns a new stack with `update` applied to the head frame. */
export function updateHead(
  stack: Stack,
  operation: string,
  update: (head: ProjectFrame) => ProjectFrame,
): Stack {
  const [head, ...rest] = stack;
  if (!head) {
    throw new StackPreconditionError(`Cannot run "${operation}" on an empty project stack`, operation);
  }
  return [update(head), ...rest];
}

export interface RecursionSplit {
  /** Non-recursing frames above the first recursing one, head first. */
  top: ProjectFrame[];
  mid: ProjectFrame;
  bottom: ProjectFrame[];
}

export function splitAtRecursing(stack: Stack): RecursionSplit | null {
  const index = stack.findIndex((frame) => frame.recursing);
  if (index === -1) {
    return null;
  }
  return {
    top: stack.slice(0, index),
    mid: stack[index],
    bottom: stack.slice(index + 1),
  };
}

/** Last modification time in whole seconds since the epoch, 0 if the file cannot be stat'ed. */
export function lastModified(file: string): number {
  try {
    return Math.floor(fs.statSync(file).mtimeMs / 1000);
  } catch {
    return 0;
  }
}

export function maxModified(files: readonly string[]): number {
  return files.reduce((max, file) => Math.max(max, lastModified(file)), 0);
}
