import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import { ValidationError, errorMessage } from '../../lib/errors';
import { MediaTable } from '../../lib/media-types';
import { logger as rootLogger } from '../../utils/logger';
import { QueueState, QueueStateSchema, emptyQueueState } from '../ingest/queue-types';
import { CartSelection } from './cart';

const logger = rootLogger.child('session');

/**
 * Mutable state owned by one client session.
 */
export interface SessionState {
  cart: CartSelection;
  queue: QueueState;
}

export interface SessionStore {
  /** State for the session, created empty on first access. */
  get(sessionId: string): SessionState;
  put(sessionId: string, state: SessionState): void;
  ids(): string[];
}

export function createSessionState(): SessionState {
  return { cart: new CartSelection(), queue: emptyQueueState() };
}

const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

export function assertSessionId(sessionId: string): void {
  if (!SESSION_ID_PATTERN.test(sessionId)) {
    throw new ValidationError(`Invalid session id: ${sessionId}`, 'session');
  }
}

export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, SessionState>();

  get(sessionId: string): SessionState {
    assertSessionId(sessionId);
    let state = this.sessions.get(sessionId);
    if (!state) {
      state = createSessionState();
      this.sessions.set(sessionId, state);
    }
    return state;
  }

  put(sessionId: string, state: SessionState): void {
    assertSessionId(sessionId);
    this.sessions.set(sessionId, state);
  }

  ids(): string[] {
    return [...this.sessions.keys()];
  }
}

const PersistedSessionSchema = z.object({
  cart: z
    .object({
      media_proj: z.array(z.string()).optional(),
      media_arch: z.array(z.string()).optional(),
    })
    .default({}),
  queue: QueueStateSchema.default({}),
  savedAt: z.string().optional(),
});

const SESSION_FILE_PREFIX = 'session-';

/**
 * Session store backed by one JSON file per session in the state directory,
 * so carts and ingestion queues survive a restart.
 */
export class JsonFileSessionStore implements SessionStore {
  private readonly cache = new Map<string, SessionState>();

  constructor(private readonly stateDir: string) {}

  get(sessionId: string): SessionState {
    assertSessionId(sessionId);
    const cached = this.cache.get(sessionId);
    if (cached) return cached;

    const state = this.read(sessionId);
    this.cache.set(sessionId, state);
    return state;
  }

  put(sessionId: string, state: SessionState): void {
    assertSessionId(sessionId);
    this.cache.set(sessionId, state);
    fs.ensureDirSync(this.stateDir);
    const filePath = this.filePath(sessionId);
    const tempPath = `${filePath}.tmp`;
    fs.writeJsonSync(tempPath, { cart: state.cart.toJSON(), queue: state.queue, savedAt: new Date().toISOString() }, { spaces: 2 });
    fs.moveSync(tempPath, filePath, { overwrite: true });
  }

  ids(): string[] {
    const known = new Set(this.cache.keys());
    if (fs.existsSync(this.stateDir)) {
      for (const entry of fs.readdirSync(this.stateDir)) {
        if (entry.startsWith(SESSION_FILE_PREFIX) && entry.endsWith('.json')) {
          known.add(entry.slice(SESSION_FILE_PREFIX.length, -'.json'.length));
        }
      }
    }
    return [...known];
  }

  private read(sessionId: string): SessionState {
    const filePath = this.filePath(sessionId);
    if (!fs.existsSync(filePath)) return createSessionState();

    try {
      const parsed = PersistedSessionSchema.parse(fs.readJsonSync(filePath));
      const items = parsed.queue.items.filter(item => item.status === 'Completed' || fs.existsSync(item.sourcePath));
      return {
        cart: new CartSelection(parsed.cart),
        queue: { ...parsed.queue, items, cursor: items.findIndex(item => item.status === 'Pending') },
      };
    } catch (error) {
      logger.warn('Discarding unreadable session file', { filePath, error: errorMessage(error) });
      return createSessionState();
    }
  }

  private filePath(sessionId: string): string {
    return path.join(this.stateDir, `${SESSION_FILE_PREFIX}${sessionId}.json`);
  }
}

/**
 * Drop an asset id from the carts of every known session.
 */
export function removeFromAllCarts(sessions: SessionStore, table: MediaTable, fileId: string): number {
  let touched = 0;
  for (const sessionId of sessions.ids()) {
    const state = sessions.get(sessionId);
    if (state.cart.remove(table, [fileId]) > 0) {
      sessions.put(sessionId, state);
      touched++;
    }
  }
  return touched;
}
