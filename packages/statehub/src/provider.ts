import {
  DisposedError,
  type Logger,
  mergeConfig,
  resolveLogger,
  type StateHubConfig,
  scopedLogger,
} from 'statehub-core';
import { StateHub } from './hub.js';

/**
 * `session`: one hub per session id, isolated from every other session.
 * `process`: one hub shared by every caller.
 */
export type HubScope = 'session' | 'process';

export interface HubProviderOptions {
  scope: HubScope;
  config?: Partial<StateHubConfig>;
}

export interface HubProvider {
  readonly scope: HubScope;
  /** The hub for `sessionId`, created on first use. In `process` scope the id is ignored. */
  resolve(sessionId?: string): StateHub;
  /** Dispose and forget a session's hub. A no-op in `process` scope, and for unknown ids. */
  release(sessionId: string): void;
  /** Number of live hubs */
  readonly size: number;
  /** Dispose every hub this provider created. Later `resolve` calls throw `DisposedError`. */
  dispose(): void;
}

const DEFAULT_SESSION = 'default';

class SessionHubProvider implements HubProvider {
  readonly scope = 'session';
  private readonly hubs = new Map<string, StateHub>();
  private disposed = false;

  constructor(
    private readonly config: StateHubConfig,
    private readonly logger: Logger,
  ) {}

  get size(): number {
    return this.hubs.size;
  }

  resolve(sessionId = DEFAULT_SESSION): StateHub {
    if (this.disposed) throw new DisposedError('HubProvider', 'resolve a hub');
    let hub = this.hubs.get(sessionId);
    if (!hub) {
      hub = new StateHub(this.config);
      this.hubs.set(sessionId, hub);
      this.logger.debug(`Created hub for session ${sessionId}`);
    }
    return hub;
  }

  release(sessionId: string): void {
    const hub = this.hubs.get(sessionId);
    if (!hub) return;
    this.hubs.delete(sessionId);
    hub.dispose();
    this.logger.debug(`Released hub for session ${sessionId}`);
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    for (const hub of this.hubs.values()) hub.dispose();
    this.hubs.clear();
  }
}

class ProcessHubProvider implements HubProvider {
  readonly scope = 'process';
  private hub: StateHub | undefined;
  private disposed = false;

  constructor(private readonly config: StateHubConfig) {}

  get size(): number {
    return this.hub ? 1 : 0;
  }

  resolve(): StateHub {
    if (this.disposed) throw new DisposedError('HubProvider', 'resolve a hub');
    this.hub ??= new StateHub(this.config);
    return this.hub;
  }

  release(): void {
    // the shared hub lives until the provider is disposed
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.hub?.dispose();
    this.hub = undefined;
  }
}

/**
 * Decide how many hubs exist and who shares them
 *
 * @example
 * ```ts
 * const hubs = createHubProvider({ scope: 'session' });
 * const hub = hubs.resolve(request.sessionId);
 * // ...when the session ends
 * hubs.release(request.sessionId);
 * ```
 */
export function createHubProvider(options: HubProviderOptions): HubProvider {
  const config = mergeConfig(options.config);
  if (options.scope === 'process') {
    return new ProcessHubProvider(config);
  }
  return new SessionHubProvider(config, scopedLogger(resolveLogger(config), 'hubs'));
}
