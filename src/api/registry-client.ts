/**
 * Registry transports for delete/retract calls
 *
 * - RpcRegistryTransport: legacy JSON-RPC publishing service (one endpoint, method per call)
 * - RestRegistryTransport: REST publishing service (`<url>/delete`, `<url>/retract`)
 *
 * Both return `{ ok: false, message }` when the registry rejects a target and throw an
 * UnpublishError of kind TransportFault when the registry cannot be reached or refuses the
 * credentials, since that affects every remaining target in the batch.
 */

import * as fs from 'fs';
import type { RegistrySettings } from '../config/settings.js';
import { requireRegistryUrl } from '../config/settings.js';
import type { RegistryResponse, RegistryTransport } from '../config/unpublish-types.js';
import { UnpublishError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/** Gateway statuses that mean the service itself is unavailable */
const UNAVAILABLE_STATUSES = new Set([502, 503, 504]);
const AUTH_STATUSES = new Set([401, 403]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

abstract class HttpRegistryTransport implements RegistryTransport {
  protected readonly url: string;
  private token: string | undefined;

  constructor(protected readonly settings: RegistrySettings) {
    this.url = requireRegistryUrl(settings);
  }

  abstract readonly description: string;
  abstract delete(name: string): Promise<RegistryResponse>;
  abstract retract(name: string): Promise<RegistryResponse>;

  protected transportFault(message: string, cause?: unknown): UnpublishError {
    const credentialFile = this.settings.credentialFile ?? '(none)';
    return new UnpublishError(
      'TransportFault',
      `${message}\nIs the credential file ${credentialFile} valid?`,
      { originalMessage: message, context: { endpoint: this.url, credentialFile }, cause }
    );
  }

  private authHeaders(): Record<string, string> {
    const file = this.settings.credentialFile;
    if (!file) return {};

    if (this.token === undefined) {
      try {
        this.token = fs.readFileSync(file, 'utf8').trim();
      } catch (error) {
        throw this.transportFault(`Cannot read registry credentials: ${errorMessage(error)}`, error);
      }
    }
    return { Authorization: `Bearer ${this.token}` };
  }

  /**
   * POST a JSON body, retrying timeouts, network failures and 5xx responses with exponential
   * backoff. Whatever response survives is returned for the caller to interpret, except for
   * authentication failures and a gateway that stayed unavailable.
   */
  protected async post(endpoint: string, body: unknown): Promise<Response> {
    const { maxRetries, retryDelayMs, timeoutMs } = this.settings;
    const attempts = Math.max(1, maxRetries);
    const headers = { 'Content-Type': 'application/json', ...this.authHeaders() };

    for (let attempt = 1; attempt <= attempts; attempt++) {
      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), timeoutMs);
      const delay = Math.pow(2, attempt - 1) * retryDelayMs;

      let response: Response;
      try {
        if (this.settings.debug) {
          logger.debug('Registry request', { endpoint, body });
        }
        response = await fetch(endpoint, {
          method: 'POST',
          headers,
          body: JSON.stringify(body),
          signal: controller.signal,
        });
      } catch (error) {
        if (attempt < attempts) {
          logger.debug(`Registry request failed (${errorMessage(error)}), retrying in ${delay}ms (attempt ${attempt}/${attempts})`);
          await sleep(delay);
          continue;
        }
        throw this.transportFault(`Registry request to ${endpoint} failed: ${errorMessage(error)}`, error);
      } finally {
        clearTimeout(timer);
      }

      if (response.status >= 500) {
        if (attempt < attempts) {
          logger.debug(`Registry returned ${response.status}, retrying in ${delay}ms (attempt ${attempt}/${attempts})`);
          await sleep(delay);
          continue;
        }
        if (UNAVAILABLE_STATUSES.has(response.status)) {
          throw this.transportFault(`Registry unavailable: ${response.status} ${response.statusText}`);
        }
      }

      if (AUTH_STATUSES.has(response.status)) {
        throw this.transportFault(`Registry refused credentials: ${response.status} ${response.statusText}`);
      }

      return response;
    }

    throw this.transportFault('Registry request exhausted all retries');
  }
}

/**
 * Legacy remote-call publishing service spoken as JSON-RPC 2.0.
 */
export class RpcRegistryTransport extends HttpRegistryTransport {
  readonly description = 'rpc';
  private nextId = 1;

  delete(name: string): Promise<RegistryResponse> {
    return this.call('deleteDataset', [name, true, 'Deleting dataset']);
  }

  retract(name: string): Promise<RegistryResponse> {
    return this.call('retractDataset', [name, 'Retracting dataset']);
  }

  private async call(method: string, params: unknown[]): Promise<RegistryResponse> {
    const response = await this.post(this.url, { jsonrpc: '2.0', id: this.nextId++, method, params });
    const text = await response.text();

    if (!response.ok) {
      return { ok: false, message: `${response.status} ${response.statusText}\n${text}`.trim() };
    }

    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch {
      return { ok: false, message: `Malformed registry response for ${method}\n${text}`.trim() };
    }

    if (isRecord(payload) && isRecord(payload.error)) {
      const { message, data } = payload.error;
      const lines = [typeof message === 'string' ? message : `Remote call ${method} failed`];
      if (data !== undefined) {
        lines.push(typeof data === 'string' ? data : JSON.stringify(data));
      }
      return { ok: false, message: lines.join('\n') };
    }

    return { ok: true };
  }
}

/**
 * REST publishing service: one POST per operation, the dataset identifier in the body.
 */
export class RestRegistryTransport extends HttpRegistryTransport {
  readonly description = 'rest';

  delete(name: string): Promise<RegistryResponse> {
    return this.send('delete', name, 'Deleting dataset');
  }

  retract(name: string): Promise<RegistryResponse> {
    return this.send('retract', name, 'Retracting dataset');
  }

  private async send(operation: 'delete' | 'retract', id: string, reason: string): Promise<RegistryResponse> {
    const endpoint = `${this.url.replace(/\/+$/, '')}/${operation}`;
    const response = await this.post(endpoint, { id, reason });

    if (response.ok) {
      return { ok: true };
    }

    const text = (await response.text()).trim();
    return { ok: false, message: text || `${response.status} ${response.statusText}` };
  }
}

export function createRegistryTransport(settings: RegistrySettings): RegistryTransport {
  return settings.transport === 'rest' ? new RestRegistryTransport(settings) : new RpcRegistryTransport(settings);
}
