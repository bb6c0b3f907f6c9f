import open from 'open';
import { LoggingService, toError } from '../services/LoggingService';

export class BrowserLauncher {
  private logger: LoggingService;

  constructor(logger: LoggingService) {
    this.logger = logger;
  }

  /**
   * Open URL in the default browser; failures are reported, not thrown
   * @returns Whether the browser was launched
   */
  async open(url: string): Promise<boolean> {
    try {
      this.logger.info(`Opening browser to ${url}`);
      await open(url);
      return true;
    } catch (error) {
      this.logger.warn(`Failed to open browser: ${toError(error).message}`);
      this.logger.info(`Please navigate to ${url} manually`);
      return false;
    }
  }
}
