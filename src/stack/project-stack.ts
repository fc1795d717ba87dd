import * as path from 'node:path';
import {
  type FrameView,
  LogLevel,
  type ProjectConfig,
  type ProjectFrame,
  type PushResult,
  type StackOptions,
  type StackState,
} from '../types';
import { DEFAULT_TIMEOUT_MS, StateOwner } from '../state/state-owner';
import { ProcessWorkingDirectory, type WorkingDirectory } from '../workspace/working-directory';
import { StackPreconditionError } from './errors';
import {
  createFrame,
  findProjectNamed,
  maxModified,
  splitAtRecursing,
  toView,
  updateHead,
} from './frames';
import { frameLog, stackLog } from '../utils/logger';

const DEFAULT_OPTIONS: StackOptions = {
  timeoutMs: DEFAULT_TIMEOUT_MS,
  restoreCwdAfterRoot: false,
};

interface RootEntry {
  top: ProjectFrame[];
  file: string;
}

/**
 * Tracks the projects a build is currently nested in. The head of the stack
 * is the active project; pending config overrides apply to the next push.
 *
 * Every method goes through one `StateOwner`, so operations from concurrent
 * build steps never interleave. Methods returning `void` are fire-and-forget
 * but are still ordered before any later call on the same instance.
 */
export class ProjectStack {
  private readonly owner: StateOwner<StackState>;
  private readonly options: StackOptions;
  private readonly workingDirectory: WorkingDirectory;

  constructor(
    options: Partial<StackOptions> = {},
    workingDirectory: WorkingDirectory = new ProcessWorkingDirectory(),
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.workingDirectory = workingDirectory;
    this.owner = new StateOwner<StackState>(
      { stack: [], pendingConfig: {}, cache: new Map() },
      this.options.timeoutMs,
    );
  }

  // ── Stack operations ──────────────────────────────────────────────────

  push(name: string | null, config: ProjectConfig, file: string): Promise<PushResult> {
    return this.owner.call('push', (state): [PushResult, StackState] => {
      const conflicting = findProjectNamed(name, state.stack);
      if (conflicting !== undefined) {
        frameLog(name, `Already on the stack, defined in ${conflicting}`, LogLevel.WARN);
        return [{ ok: false, file: conflicting }, state];
      }

      const frame = createFrame(name, { ...config, ...state.pendingConfig }, file, state.stack);
      frameLog(name, `Pushed at position ${frame.position} from ${file}`);
      return [
        { ok: true },
        { ...state, pendingConfig: {}, stack: [frame, ...state.stack] },
      ];
    });
  }

  pop(): Promise<FrameView | null> {
    return this.owner.call('pop', (state): [FrameView | null, StackState] => {
      const [head, ...rest] = state.stack;
      if (!head) {
        return [null, state];
      }
      frameLog(head.name, 'Popped');
      return [toView(head), { ...state, stack: rest }];
    });
  }

  peek(): Promise<FrameView | null> {
    return this.owner.get('peek', (state) => {
      const [head] = state.stack;
      return head ? toView(head) : null;
    });
  }

  depth(): Promise<number> {
    return this.owner.get('depth', (state) => state.stack.length);
  }

  /** Views of every frame, active project first. */
  frames(): Promise<FrameView[]> {
    return this.owner.get('frames', (state) => state.stack.map(toView));
  }

  /** Merges `config` into the overrides applied to the next pushed project. */
  postConfig(config: ProjectConfig): void {
    this.owner.cast('postConfig', (state) => ({
      ...state,
      pendingConfig: { ...state.pendingConfig, ...config },
    }));
  }

  /**
   * Returns the active project's app name the first time it is asked while
   * that project is on top, and `null` afterwards. Ancestors are reset so
   * each announces itself again once control returns to it.
   */
  printableAppName(): Promise<string | null> {
    return this.owner.call('printableAppName', (state): [string | null, StackState] => {
      const [head, ...rest] = state.stack;
      if (!head || head.ioDone) {
        return [null, state];
      }

      const app = typeof head.config.app === 'string' ? head.config.app : null;
      const stack = [
        { ...head, ioDone: true },
        ...rest.map((frame) => ({ ...frame, ioDone: false })),
      ];
      return [app, { ...state, stack }];
    });
  }

  clearStack(): void {
    this.owner.cast('clearStack', (state) => ({ ...state, stack: [], pendingConfig: {} }));
  }

  // ── Recursion & root scoping ──────────────────────────────────────────

  /**
   * Runs `fn` with the active project marked as recursing. The mark is
   * cleared from whichever project is on top once `fn` settles.
   */
  async recur<T>(fn: () => T | Promise<T>): Promise<T> {
    this.setHeadRecursing('recur', true);
    try {
      return await fn();
    } finally {
      this.setHeadRecursing('recur', false);
    }
  }

  /** Name of the nearest recursing project, head first. */
  recursing(): Promise<string | null> {
    return this.owner.get('recursing', (state) => {
      const frame = state.stack.find((f) => f.recursing);
      return frame?.name ?? null;
    });
  }

  /** Whether any frame is recursing, anonymous ones included. */
  hasRecursingFrame(): Promise<boolean> {
    return this.owner.get('hasRecursingFrame', (state) => state.stack.some((f) => f.recursing));
  }

  /**
   * Runs `fn` from the directory of the nearest recursing project, with the
   * frames above it hidden. The hidden frames are put back on top of
   * whatever the stack holds once `fn` settles, and the recursing mark is
   * restored on the head beneath them.
   *
   * The working directory is left at the ancestor's directory unless
   * `restoreCwdAfterRoot` is set.
   */
  async root<T>(fn: () => T | Promise<T>): Promise<T> {
    const { top, file } = await this.owner.call('root', (state): [RootEntry, StackState] => {
      const split = splitAtRecursing(state.stack);
      if (!split) {
        throw new StackPreconditionError('No recursing project to root into', 'root');
      }
      const { mid, bottom } = split;
      frameLog(mid.name, `Rooting ${split.top.length} project(s) at ${path.dirname(mid.file)}`);
      return [
        { top: split.top, file: mid.file },
        { ...state, stack: [{ ...mid, recursing: false }, ...bottom] },
      ];
    });

    const previous = this.workingDirectory.current();
    try {
      this.workingDirectory.change(path.dirname(file));
      return await fn();
    } finally {
      // Queued before the directory restore so a failing chdir cannot drop `top`.
      this.owner.cast('root', (state) => ({
        ...state,
        stack: [...top, ...updateHead(state.stack, 'root', (head) => ({ ...head, recursing: true }))],
      }));
      if (this.options.restoreCwdAfterRoot) {
        this.workingDirectory.change(previous);
      }
    }
  }

  private setHeadRecursing(operation: string, recursing: boolean): void {
    this.owner.cast(operation, (state) => ({
      ...state,
      stack: updateHead(state.stack, operation, (head) => ({ ...head, recursing })),
    }));
  }

  // ── Config staleness ──────────────────────────────────────────────────

  /** Records the apps and files a config load contributed to the active project. */
  loadedConfig(apps: readonly string[], files: readonly string[]): void {
    this.owner.cast('loadedConfig', (state) => {
      if (state.stack.length === 0) {
        return state;
      }
      return {
        ...state,
        stack: updateHead(state.stack, 'loadedConfig', (head) => ({
          ...head,
          configApps: [...apps, ...head.configApps],
          configFiles: [...files, ...head.configFiles],
          configMtime: null,
        })),
      };
    });
  }

  /**
   * Latest mtime (seconds) across the active project's config files. Computed
   * on first request and cached until `loadedConfig` adds files.
   */
  configMtime(): Promise<number> {
    return this.owner.call('configMtime', (state): [number, StackState] => {
      const [head, ...rest] = state.stack;
      if (!head) {
        return [0, state];
      }
      if (head.configMtime !== null) {
        return [head.configMtime, state];
      }

      const mtime = maxModified(head.configFiles);
      stackLog(`Computed config mtime ${mtime} over ${head.configFiles.length} file(s)`);
      return [mtime, { ...state, stack: [{ ...head, configMtime: mtime }, ...rest] }];
    });
  }

  configApps(): Promise<string[]> {
    return this.owner.get('configApps', (state) => [...(state.stack[0]?.configApps ?? [])]);
  }

  configFiles(): Promise<string[]> {
    return this.owner.get('configFiles', (state) => [...(state.stack[0]?.configFiles ?? [])]);
  }

  // ── General cache ─────────────────────────────────────────────────────

  /** Stored value, or `undefined` when absent. */
  readCache(key: unknown): Promise<unknown> {
    return this.owner.get('readCache', (state) => state.cache.get(key));
  }

  writeCache<V>(key: unknown, value: V): V {
    this.owner.cast('writeCache', (state) => {
      state.cache.set(key, value);
      return state;
    });
    return value;
  }

  deleteCache(key: unknown): void {
    this.owner.cast('deleteCache', (state) => {
      state.cache.delete(key);
      return state;
    });
  }

  clearCache(): void {
    this.owner.cast('clearCache', (state) => ({ ...state, cache: new Map() }));
  }
}
