import { ConfigurationError } from '../errors.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import type {
  Conversation,
  ProviderClient,
  ProviderIdentity,
  ResponseFormatDirective,
} from '../providers/types.js';
import { NO_FORMAT, PROVIDER_LABELS } from '../providers/types.js';
import type { ProbeReport } from '../readiness/types.js';

export interface LocalReadinessCheck {
  recheck(): Promise<ProbeReport>;
}

export interface ChatRouterOptions {
  clients: Partial<Record<ProviderIdentity, ProviderClient>>;
  initial: ProviderIdentity;
  readiness?: LocalReadinessCheck;
  logger?: Logger;
}

export type SwitchOutcome =
  | { ok: true; identity: ProviderIdentity; report?: ProbeReport }
  | { ok: false; identity: ProviderIdentity; reason: string; report?: ProbeReport };

/**
 * Single call site for every LLM request. Dispatch is a lookup on the
 * current identity; errors from the client propagate unchanged.
 */
export class ChatRouter {
  private clients: Partial<Record<ProviderIdentity, ProviderClient>>;
  private current: ProviderIdentity;
  private readiness?: LocalReadinessCheck;
  private logger: Logger;
  private localVerified = false;

  constructor(options: ChatRouterOptions) {
    this.clients = options.clients;
    this.readiness = options.readiness;
    this.logger = options.logger ?? silentLogger;
    this.requireClient(options.initial);
    this.current = options.initial;
  }

  get identity(): ProviderIdentity {
    return this.current;
  }

  get isLocalVerified(): boolean {
    return this.localVerified;
  }

  /** Current model identifier, for display. */
  get modelName(): string {
    return this.requireClient(this.current).modelName;
  }

  /** Record that the local provider passed a readiness probe this session. */
  markLocalVerified(): void {
    this.localVerified = true;
  }

  async chat(conversation: Conversation, format: ResponseFormatDirective = NO_FORMAT): Promise<string> {
    // Resolve the client before any await so a later switch cannot redirect this call.
    const client = this.requireClient(this.current);
    this.logger.debug(`Dispatching ${conversation.length} message(s) to ${PROVIDER_LABELS[client.identity]} (${format.kind})`);
    return client.sendChat(conversation, format);
  }

  /**
   * Decide whether a switch may happen, running the local re-check when
   * needed. Changes nothing; pass the outcome to `applySwitch`.
   */
  async prepareSwitch(identity: ProviderIdentity): Promise<SwitchOutcome> {
    if (!this.clients[identity]) {
      return {
        ok: false,
        identity: this.current,
        reason: identity === 'CLOUD'
          ? 'OPENAI_API_KEY must be set to use OpenAI'
          : `${PROVIDER_LABELS[identity]} is not configured`,
      };
    }

    if (identity === 'LOCAL' && !this.localVerified) {
      if (!this.readiness) {
        return { ok: false, identity: this.current, reason: 'No readiness check available for Ollama' };
      }
      const report = await this.readiness.recheck();
      if (report.state !== 'READY') {
        this.logger.warn(`Switch to Ollama refused: ${report.message}`);
        return { ok: false, identity: this.current, reason: report.message, report };
      }
      return { ok: true, identity, report };
    }

    return { ok: true, identity };
  }

  applySwitch(outcome: SwitchOutcome): void {
    if (!outcome.ok) {
      return;
    }
    if (outcome.identity === 'LOCAL' && outcome.report?.state === 'READY') {
      this.localVerified = true;
    }
    this.current = outcome.identity;
    this.logger.info(`Switched provider to ${PROVIDER_LABELS[outcome.identity]}`);
  }

  async switchTo(identity: ProviderIdentity): Promise<SwitchOutcome> {
    const outcome = await this.prepareSwitch(identity);
    this.applySwitch(outcome);
    return outcome;
  }

  toggle(): Promise<SwitchOutcome> {
    return this.switchTo(this.other());
  }

  /** The identity a toggle would switch to. */
  other(): ProviderIdentity {
    return this.current === 'LOCAL' ? 'CLOUD' : 'LOCAL';
  }

  private requireClient(identity: ProviderIdentity): ProviderClient {
    const client = this.clients[identity];
    if (!client) {
      throw new ConfigurationError(`No client configured for ${PROVIDER_LABELS[identity]}`, {
        hint: identity === 'CLOUD' ? 'Set OPENAI_API_KEY' : undefined,
      });
    }
    return client;
  }
}
