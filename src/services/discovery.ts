/**
 * Discovery service reinitialization trigger. Failures are logged, never raised.
 */

import type { DiscoveryService } from '../config/unpublish-types.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export class HttpDiscoveryService implements DiscoveryService {
  constructor(
    private readonly url: string,
    private readonly timeoutMs = 30_000
  ) {}

  async reinitialize(): Promise<void> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      logger.info(`Reinitializing discovery service: ${this.url}`);
      const response = await fetch(this.url, { method: 'POST', signal: controller.signal });
      if (!response.ok) {
        logger.warn(`Discovery reinitialization failed: ${response.status} ${response.statusText}`);
        return;
      }
      logger.success('Discovery service reinitialized');
    } catch (error) {
      logger.warn(`Discovery reinitialization failed: ${errorMessage(error)}`);
    } finally {
      clearTimeout(timer);
    }
  }
}
