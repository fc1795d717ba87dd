/**
 * Core type definitions for the project context stack.
 * These types define the contracts between the stack, its state owner and callers.
 */

// ─── Project Frames ──────────────────────────────────────────────────────────

/** Opaque, ordered key/value configuration of a project. */
export type ProjectConfig = Record<string, unknown>;

export interface ProjectFrame {
  name: string | null;
  config: ProjectConfig;
  file: string;
  /** Stack depth before the push. The bottom-most frame has position 0. */
  position: number;
  recursing: boolean;
  /** Whether the frame has already announced itself to the user. */
  ioDone: boolean;
  /** Newest contributions first. */
  configApps: string[];
  /** Newest contributions first; the defining file is the initial member. */
  configFiles: string[];
  /** Cached maximum mtime of `configFiles`, `null` until computed. */
  configMtime: number | null;
}

export type FrameView = Pick<ProjectFrame, 'name' | 'config' | 'file' | 'position'>;

/**
 * Frames ordered head first: index 0 is the active project, the last index
 * is the outermost ancestor.
 */
export type Stack = readonly ProjectFrame[];

export type PushResult =
  | { ok: true }
  | { ok: false; file: string };

// ─── Owner State ─────────────────────────────────────────────────────────────

export interface StackState {
  stack: Stack;
  pendingConfig: ProjectConfig;
  cache: Map<unknown, unknown>;
}

// ─── Options ─────────────────────────────────────────────────────────────────

export interface StackOptions {
  timeoutMs: number;
  restoreCwdAfterRoot: boolean;
}

export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
}
