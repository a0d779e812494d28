import { spawn } from 'child_process';

export interface ServiceLauncher {
  /** Human-readable command, used in log lines */
  readonly description: string;
  /**
   * Start the server in the background. Resolves once the process has been
   * spawned, not once it is listening.
   */
  launch(): Promise<void>;
}

/**
 * Starts a long-lived server detached from this process, with its output
 * discarded, so it outlives the quiz.
 */
export class DetachedProcessLauncher implements ServiceLauncher {
  readonly description: string;

  constructor(
    private command: string = 'ollama',
    private args: string[] = ['serve']
  ) {
    this.description = [command, ...args].join(' ');
  }

  launch(): Promise<void> {
    return new Promise((resolve, reject) => {
      const child = spawn(this.command, this.args, {
        detached: true,
        stdio: 'ignore',
      });

      child.once('error', reject);
      child.once('spawn', () => {
        child.unref();
        resolve();
      });
    });
  }
}

export function isExecutableMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
