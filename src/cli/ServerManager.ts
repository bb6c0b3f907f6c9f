import axios from 'axios';
import { Express } from 'express';
import { Server } from 'http';
import { startServer } from '../api';
import { LoggingService, toError } from '../services/LoggingService';

export class ServerManager {
  private server: Server | null = null;
  private app: Express;
  private port: number;
  private logger: LoggingService;

  /**
   * @param port - Port to listen on; 0 picks a free port when started
   */
  constructor(app: Express, port: number, logger: LoggingService) {
    this.app = app;
    this.port = port;
    this.logger = logger;
  }

  /**
   * Start the dashboard server and wait until it answers health checks
   * @throws Error if another process already serves on the port, or the
   * started server never passes a health check (it is closed again first)
   */
  async start(): Promise<void> {
    if (this.isRunning()) {
      this.logger.info(`Server already running at ${this.getUrl()}`);
      return;
    }

    if (this.port !== 0 && (await this.checkIfServerRunning())) {
      throw new Error(`Port ${this.port} is already serving at ${this.getUrl()}`);
    }

    const server = await startServer(this.app, this.port, this.logger);
    this.server = server;
    const address = server.address();
    if (address !== null && typeof address === 'object') {
      this.port = address.port;
    }

    try {
      await this.waitForServer();
    } catch (error) {
      await this.stop();
      throw error;
    }
    this.logger.info(`Server started at ${this.getUrl()}`);
  }

  /**
   * Stop the server
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }

    return new Promise((resolve, reject) => {
      server.close((err) => {
        if (err) {
          reject(err);
        } else {
          this.server = null;
          this.logger.info('Server stopped');
          resolve();
        }
      });
    });
  }

  isRunning(): boolean {
    return this.server !== null;
  }

  getUrl(): string {
    return `http://localhost:${this.port}`;
  }

  /**
   * Check whether something answers the health endpoint on the port
   */
  async checkIfServerRunning(): Promise<boolean> {
    try {
      const response = await axios.get(`${this.getUrl()}/api/health`, {
        timeout: 1000,
      });
      return response.status === 200;
    } catch (error) {
      // Connection refused means nothing is listening
      if (axios.isAxiosError(error) && error.code === 'ECONNREFUSED') {
        return false;
      }
      this.logger.debug(`Unexpected error checking server status: ${toError(error).message}`);
      return false;
    }
  }

  private async waitForServer(maxAttempts: number = 10): Promise<void> {
    for (let i = 0; i < maxAttempts; i++) {
      const running = await this.checkIfServerRunning();
      if (running) {
        return;
      }
      await new Promise((resolve) => setTimeout(resolve, 100));
    }
    throw new Error('Server failed to start');
  }
}
