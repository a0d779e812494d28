import type { Settings } from './config/settings.js';
import { DocumentStore } from './corpus/document-store.js';
import { createFileLogger, type Logger } from './logging/logger.js';
import { createProviderClients, type ProviderClients } from './providers/factory.js';
import { QuizOrchestrator } from './quiz/orchestrator.js';
import { DetachedProcessLauncher } from './readiness/service-launcher.js';
import { ReadinessProber } from './readiness/prober.js';
import { ChatRouter } from './router/chat-router.js';

export interface RecallApp {
  settings: Settings;
  logger: Logger;
  clients: ProviderClients;
  documents: DocumentStore;
  prober: ReadinessProber;
  router: ChatRouter;
  orchestrator: QuizOrchestrator;
}

/**
 * Wire every component from one settings object. Nothing here touches the
 * network; the prober does that when asked.
 */
export function createApp(settings: Settings, logger: Logger = createFileLogger({
  file: settings.logFile,
  level: settings.logLevel,
})): RecallApp {
  const clients = createProviderClients(settings);
  const documents = new DocumentStore(settings.articlesDir);
  const prober = new ReadinessProber({
    admin: clients.local,
    launcher: new DetachedProcessLauncher('ollama', ['serve']),
    corpus: documents,
    logger,
  });
  const router = new ChatRouter({
    clients: { LOCAL: clients.local, CLOUD: clients.cloud },
    initial: settings.defaultProvider,
    readiness: prober,
    logger,
  });
  const orchestrator = new QuizOrchestrator({ router, logger });

  return { settings, logger, clients, documents, prober, router, orchestrator };
}
