import { setTimeout as delay } from 'node:timers/promises';
import {
  BackendUnreachableError,
  CorpusEmptyError,
  ModelUnavailableError,
  RecallError,
  errorMessage,
} from '../errors.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import type { LocalModelAdmin, ProviderIdentity } from '../providers/types.js';
import { isExecutableMissing, type ServiceLauncher } from './service-launcher.js';
import {
  DEFAULT_MAX_START_ATTEMPTS,
  DEFAULT_POLL_INTERVAL_MS,
  type CorpusCheck,
  type ProbeReport,
  type ProbeState,
  type Sleep,
  type TransitionListener,
} from './types.js';

export interface ReadinessProberOptions {
  admin: LocalModelAdmin;
  launcher: ServiceLauncher;
  corpus: CorpusCheck;
  logger?: Logger;
  sleep?: Sleep;
  pollIntervalMs?: number;
  maxStartAttempts?: number;
  onTransition?: TransitionListener;
}

class ProbeRun {
  state: ProbeState = 'UNCHECKED';
  message = '';
  error?: RecallError;
  readonly transitions: ProbeState[] = [];

  constructor(private listener: TransitionListener) {}

  enter(state: ProbeState, message: string): void {
    this.state = state;
    this.message = message;
    this.transitions.push(state);
    this.listener(state, message);
  }

  fail(error: RecallError): false {
    this.error = error;
    this.enter('FAILED', error.message);
    return false;
  }

  report(): ProbeReport {
    return {
      state: this.state,
      message: this.message,
      transitions: [...this.transitions],
      error: this.error,
    };
  }
}

/**
 * Checks that the local Ollama server is up (starting it if needed), that
 * the configured model is installed (pulling it if needed) and that there
 * is something to be quizzed on. Never retries past its fixed budget.
 */
export class ReadinessProber {
  private admin: LocalModelAdmin;
  private launcher: ServiceLauncher;
  private corpus: CorpusCheck;
  private logger: Logger;
  private sleep: Sleep;
  private pollIntervalMs: number;
  private maxStartAttempts: number;
  private listeners: TransitionListener[] = [];

  constructor(options: ReadinessProberOptions) {
    this.admin = options.admin;
    this.launcher = options.launcher;
    this.corpus = options.corpus;
    this.logger = options.logger ?? silentLogger;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.maxStartAttempts = options.maxStartAttempts ?? DEFAULT_MAX_START_ATTEMPTS;
    if (options.onTransition) {
      this.listeners.push(options.onTransition);
    }
  }

  /** Register a listener for state changes; returns an unsubscribe function. */
  onTransition(listener: TransitionListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter(l => l !== listener);
    };
  }

  /**
   * Full startup sequence. For the cloud provider only the corpus is
   * checked; its credential was validated when settings were loaded.
   */
  async probe(identity: ProviderIdentity): Promise<ProbeReport> {
    const run = this.newRun();
    if (identity === 'LOCAL') {
      const ok = (await this.serviceStep(run)) && (await this.modelStep(run, true));
      if (!ok) return run.report();
    }
    if (await this.corpusStep(run)) {
      run.enter('READY', 'Ready!');
      this.logger.info('Startup: Complete.');
    }
    return run.report();
  }

  /**
   * Lightweight check used when switching to the local provider mid-session:
   * the server may be started, but a missing model is reported rather than
   * pulled.
   */
  async recheck(): Promise<ProbeReport> {
    const run = this.newRun();
    if ((await this.serviceStep(run)) && (await this.modelStep(run, false))) {
      run.enter('READY', 'Ready!');
    }
    return run.report();
  }

  async ensureService(): Promise<ProbeReport> {
    const run = this.newRun();
    await this.serviceStep(run);
    return run.report();
  }

  async ensureModel(options: { pull?: boolean } = {}): Promise<ProbeReport> {
    const run = this.newRun();
    await this.modelStep(run, options.pull ?? true);
    return run.report();
  }

  async checkCorpus(): Promise<ProbeReport> {
    const run = this.newRun();
    if (await this.corpusStep(run)) {
      run.enter('READY', 'Ready!');
    }
    return run.report();
  }

  private newRun(): ProbeRun {
    return new ProbeRun((state, message) => {
      for (const listener of this.listeners) {
        listener(state, message);
      }
    });
  }

  private async serviceStep(run: ProbeRun): Promise<boolean> {
    run.enter('CHECKING_SERVICE', 'Checking Ollama service...');
    this.logger.info('Startup: Checking Ollama service...');

    if (await this.reachable()) {
      run.enter('SERVICE_UP', 'Ollama service is running.');
      this.logger.info('Startup: Ollama service is running.');
      return true;
    }

    this.logger.warn(`Startup: Ollama not running. Attempting to start with '${this.launcher.description}'...`);
    try {
      await this.launcher.launch();
    } catch (error) {
      if (isExecutableMissing(error)) {
        this.logger.error('Startup: Ollama binary not found.');
        return run.fail(
          new BackendUnreachableError('LOCAL', 'Ollama executable not found. Please install Ollama.', {
            cause: error,
            hint: 'Install Ollama from https://ollama.com/download, then run this again',
          })
        );
      }
      this.logger.error(`Startup: Could not launch Ollama: ${errorMessage(error)}`);
      return run.fail(
        new BackendUnreachableError('LOCAL', `Could not launch '${this.launcher.description}': ${errorMessage(error)}`, {
          cause: error,
          hint: "Run 'ollama serve' manually",
        })
      );
    }

    run.enter('STARTING_SERVICE', 'Ollama not running. Attempting to start...');
    this.logger.info('Startup: Launched ollama serve.');

    for (let attempt = 1; attempt <= this.maxStartAttempts; attempt++) {
      await this.sleep(this.pollIntervalMs);
      if (await this.reachable()) {
        run.enter('SERVICE_UP', 'Ollama service is running.');
        this.logger.info('Startup: Ollama connected successfully.');
        return true;
      }
      this.logger.debug(`Startup: Waiting for Ollama... attempt ${attempt}`);
    }

    this.logger.error('Startup: Timeout starting Ollama.');
    return run.fail(
      new BackendUnreachableError('LOCAL', "Could not start Ollama. Please run 'ollama serve' manually.", {
        hint: "Start the server in another terminal with 'ollama serve'",
      })
    );
  }

  private async modelStep(run: ProbeRun, pull: boolean): Promise<boolean> {
    const modelName = this.admin.modelName;
    run.enter('CHECKING_MODEL', `Checking for model ${modelName}...`);
    this.logger.info(`Startup: Checking for model ${modelName}...`);

    try {
      const installed = await this.admin.listModels();
      this.logger.info(`Startup: Found models: ${installed.join(', ') || '(none)'}`);

      if (!isModelInstalled(modelName, installed)) {
        if (!pull) {
          return run.fail(
            new ModelUnavailableError(modelName, `Model ${modelName} is not installed.`, {
              hint: `Pull it with 'ollama pull ${modelName}' or run 'recall check --provider ollama'`,
            })
          );
        }
        run.enter('PULLING_MODEL', `Model ${modelName} not found. Pulling (this may take a while)...`);
        this.logger.info(`Startup: ${modelName} not found. Pulling...`);
        await this.admin.pullModel(modelName);
        this.logger.info('Startup: Pull complete.');
      }
    } catch (error) {
      this.logger.error(`Startup: Model check failed: ${errorMessage(error)}`);
      return run.fail(
        new ModelUnavailableError(modelName, `Error checking/pulling model: ${errorMessage(error)}`, {
          cause: error,
          hint: `Try 'ollama pull ${modelName}' by hand`,
        })
      );
    }

    run.enter('MODEL_PRESENT', `Model ${modelName} is available.`);
    return true;
  }

  private async corpusStep(run: ProbeRun): Promise<boolean> {
    this.logger.info('Startup: Checking articles...');
    if (await this.corpus.hasDocuments()) {
      return true;
    }
    this.logger.error('Startup: No articles found.');
    return run.fail(
      new CorpusEmptyError(this.corpus.directory, {
        hint: 'Add .md files there or set ARTICLES_DIR',
      })
    );
  }

  private async reachable(): Promise<boolean> {
    try {
      return await this.admin.isReachable();
    } catch (error) {
      this.logger.debug(`Startup: Reachability probe failed: ${errorMessage(error)}`);
      return false;
    }
  }
}

/**
 * Substring match: `gemma2:2b` matches `gemma2:2b-instruct-q4` and
 * `gemma2` matches `gemma2:latest`. It can also match an unrelated model
 * sharing a prefix.
 */
export function isModelInstalled(modelName: string, installed: string[]): boolean {
  return installed.some(name => name.includes(modelName));
}
