import * as path from 'node:path';
import { type ProjectConfig } from '../types';
import { type ProjectStack } from '../stack/project-stack';
import { type ProjectManifest } from './manifest';

export enum WalkEventType {
  ENTER = 'enter',
  BANNER = 'banner',
  CONFLICT = 'conflict',
  ROOTED = 'rooted',
  LEAVE = 'leave',
}

export interface WalkEvent {
  type: WalkEventType;
  project: string | null;
  detail: string;
  depth: number;
  /** Config staleness fingerprint, reported on ENTER. */
  mtime?: number;
}

export interface WalkOptions {
  /** Config posted before the top-level project is pushed. */
  overrides?: ProjectConfig;
  /** Run each leaf from the directory of its nearest recursing ancestor. */
  fromRoot?: boolean;
}

/**
 * Drives a `ProjectStack` through an umbrella tree the way a build tool
 * does: push on entry, announce when taking over the output, recurse into
 * children, pop on exit.
 */
export class TreeWalker {
  private readonly stack: ProjectStack;

  constructor(stack: ProjectStack) {
    this.stack = stack;
  }

  async walk(root: ProjectManifest, options: WalkOptions = {}): Promise<WalkEvent[]> {
    const events: WalkEvent[] = [];
    if (options.overrides && Object.keys(options.overrides).length > 0) {
      this.stack.postConfig(options.overrides);
    }
    await this.visit(root, 0, options, events);
    return events;
  }

  private async visit(
    project: ProjectManifest,
    depth: number,
    options: WalkOptions,
    events: WalkEvent[],
  ): Promise<void> {
    const config = project.app === undefined ? project.config : { ...project.config, app: project.app };
    const pushed = await this.stack.push(project.name, config, project.file);
    if (!pushed.ok) {
      events.push({
        type: WalkEventType.CONFLICT,
        project: project.name,
        detail: `already defined in ${pushed.file}`,
        depth,
      });
      return;
    }

    try {
      if (project.app !== undefined || project.configFiles.length > 0) {
        this.stack.loadedConfig(project.app === undefined ? [] : [project.app], project.configFiles);
      }

      const view = await this.stack.peek();
      events.push({
        type: WalkEventType.ENTER,
        project: project.name,
        detail: `position ${view?.position ?? 0}`,
        depth,
        mtime: await this.stack.configMtime(),
      });
      await this.announce(project, depth, events);

      if (project.children.length > 0) {
        await this.stack.recur(async () => {
          for (const child of project.children) {
            await this.visit(child, depth + 1, options, events);
          }
        });
        // Children took over the output; announce again before continuing here.
        await this.announce(project, depth, events);
      } else if (options.fromRoot && (await this.stack.hasRecursingFrame())) {
        const ancestor = await this.stack.root(() => this.stack.peek());
        events.push({
          type: WalkEventType.ROOTED,
          project: project.name,
          detail: ancestor ? `${ancestor.name ?? '(anonymous)'} at ${path.dirname(ancestor.file)}` : '',
          depth,
        });
      }
    } finally {
      await this.stack.pop();
      events.push({ type: WalkEventType.LEAVE, project: project.name, detail: '', depth });
    }
  }

  private async announce(project: ProjectManifest, depth: number, events: WalkEvent[]): Promise<void> {
    const app = await this.stack.printableAppName();
    if (app !== null) {
      events.push({ type: WalkEventType.BANNER, project: project.name, detail: app, depth });
    }
  }
}
