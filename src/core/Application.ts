/**
 * Main Application Orchestrator
 * Coordinates startup, shutdown, and server lifecycle
 */
import type { Server } from 'http';
import { logger, symbols } from './Logger.js';
import { PrometheusRecorder } from './Metrics.js';
import { ConfigManager, getConfig } from '../config/ConfigManager.js';
import {
  DesignateClient,
  DesignateProvider,
  DomainFilter,
  InstrumentedDesignateClient,
  KeystoneAuth,
} from '../providers/index.js';
import { createStatusApp, createWebhookApp, startServer, stopServer } from '../app.js';

export class Application {
  private config: ConfigManager;
  private readonly recorder = new PrometheusRecorder();
  private isRunning: boolean = false;
  private ready: boolean = false;
  private shutdownPromise: Promise<void> | null = null;
  private statusServer: Server | null = null;
  private webhookServer: Server | null = null;

  constructor() {
    this.config = getConfig();
  }

  /**
   * Start the application
   */
  async start(): Promise<void> {
    if (this.isRunning) {
      logger.warn('Application already running');
      return;
    }

    const { app, domainFilter } = this.config;
    logger.info({ dryRun: app.dryRun }, `${symbols.startup} Starting Designate webhook`);

    try {
      const auth = new KeystoneAuth(this.config.openStack);
      await this.connect(auth);

      const client = new InstrumentedDesignateClient(new DesignateClient(auth), this.recorder);
      const provider = new DesignateProvider(client, {
        domainFilter: new DomainFilter(domainFilter),
        dryRun: app.dryRun,
      });

      this.statusServer = await startServer(
        createStatusApp({ isReady: () => this.ready, recorder: this.recorder }),
        app.statusHost,
        app.statusPort,
        'Status'
      );

      this.webhookServer = await startServer(createWebhookApp(provider), app.webhookHost, app.webhookPort, 'Webhook');
      this.ready = true;

      this.setupShutdownHandlers();
      this.isRunning = true;

      logger.info(`${symbols.success} Designate webhook started`);
    } catch (error) {
      logger.error({ error }, 'Failed to start application');
      await this.closeServers();
      throw error;
    }
  }

  /**
   * Authenticate once so configuration problems surface at startup
   */
  private async connect(auth: KeystoneAuth): Promise<void> {
    try {
      const endpoint = await auth.getEndpoint();
      this.recorder.setConnected(true);
      logger.debug({ endpoint }, `${symbols.provider} Connected to OpenStack API`);
    } catch (error) {
      this.recorder.setConnected(false);
      throw error;
    }
  }

  /**
   * Setup graceful shutdown handlers
   */
  private setupShutdownHandlers(): void {
    const shutdown = async (signal: string): Promise<void> => {
      if (this.shutdownPromise) {
        logger.info('Shutdown already in progress');
        return this.shutdownPromise;
      }

      logger.info({ signal }, 'Shutdown signal received');
      this.shutdownPromise = this.shutdown(signal);
      await this.shutdownPromise;
      process.exit(0);
    };

    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('SIGINT', () => void shutdown('SIGINT'));
  }

  /**
   * Shutdown the application
   */
  async shutdown(reason: string = 'manual'): Promise<void> {
    if (!this.isRunning) {
      return;
    }

    logger.info({ reason }, 'Shutting down Designate webhook');
    this.ready = false;

    try {
      await this.closeServers();
      this.isRunning = false;
      logger.info('Shutdown complete');
    } catch (error) {
      logger.error({ error }, 'Error during shutdown');
      throw error;
    }
  }

  private async closeServers(): Promise<void> {
    if (this.webhookServer) {
      await stopServer(this.webhookServer);
      this.webhookServer = null;
    }
    if (this.statusServer) {
      await stopServer(this.statusServer);
      this.statusServer = null;
    }
  }

  get running(): boolean {
    return this.isRunning;
  }
}

export function createApplication(): Application {
  return new Application();
}
