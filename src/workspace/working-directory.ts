import * as path from 'node:path';

/** The ambient directory `ProjectStack.root` runs its callback from. */
export interface WorkingDirectory {
  current(): string;
  change(dir: string): void;
}

/**
 * Changes the real process directory. This is process-wide: two `root`
 * calls racing on one process see each other's directory.
 */
export class ProcessWorkingDirectory implements WorkingDirectory {
  current(): string {
    return process.cwd();
  }

  change(dir: string): void {
    process.chdir(dir);
  }
}

/** Tracks a directory without touching the process, resolving relative paths against it. */
export class VirtualWorkingDirectory implements WorkingDirectory {
  private dir: string;
  private readonly history: string[] = [];

  constructor(initial: string = process.cwd()) {
    this.dir = path.resolve(initial);
  }

  current(): string {
    return this.dir;
  }

  change(dir: string): void {
    this.dir = path.resolve(this.dir, dir);
    this.history.push(this.dir);
  }

  /** Every directory changed into, oldest first. */
  changes(): string[] {
    return [...this.history];
  }
}
