import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { IStateStore } from '../interfaces/IStateStore';
import { FrontierState } from '../interfaces/types';
import { PersistenceError, describeError } from '../errors';
import { LoggingUtils } from '../utils/LoggingUtils';

/**
 * On-disk layout of the state file
 */
const persistedStateSchema = z.object({
  visited: z.array(z.string()),
  file_count: z.number().int().nonnegative(),
  failed_attempts: z.record(z.string(), z.number().int().nonnegative()).optional(),
});

export type PersistedState = z.infer<typeof persistedStateSchema>;

export function emptyFrontierState(): FrontierState {
  return { visited: new Set(), fileCount: 0, failedAttempts: new Map() };
}

/**
 * State store keeping the frontier in a JSON file.
 * Saves go through a temporary file and a rename so a crash never leaves a truncated file behind.
 */
export class JsonFileStateStore implements IStateStore {
  private readonly logger = LoggingUtils.createTaggedLogger('state');

  constructor(private readonly filePath: string) {}

  async load(): Promise<FrontierState> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        this.logger.info(`No state file at ${this.filePath}, starting fresh`);
        return emptyFrontierState();
      }
      throw new PersistenceError(`Failed to read ${this.filePath}: ${describeError(error)}`, this.filePath, true, error);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new PersistenceError(`State file ${this.filePath} is not valid JSON`, this.filePath, true, error);
    }

    const parsed = persistedStateSchema.safeParse(json);
    if (!parsed.success) {
      throw new PersistenceError(
        `State file ${this.filePath} is malformed: ${parsed.error.issues.map(issue => issue.message).join('; ')}`,
        this.filePath,
        true
      );
    }

    const state = JsonFileStateStore.fromPersisted(parsed.data);
    this.logger.info(`Loaded state: ${state.visited.size} visited, ${state.fileCount} files`);
    return state;
  }

  async save(state: FrontierState): Promise<void> {
    const tempPath = `${this.filePath}.tmp`;
    const body = JSON.stringify(JsonFileStateStore.toPersisted(state), null, 2);

    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tempPath, body, 'utf-8');
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      throw new PersistenceError(`Failed to save state to ${this.filePath}: ${describeError(error)}`, this.filePath, false, error);
    }
  }

  static toPersisted(state: FrontierState): PersistedState {
    return {
      visited: Array.from(state.visited),
      file_count: state.fileCount,
      failed_attempts: Object.fromEntries(state.failedAttempts),
    };
  }

  static fromPersisted(data: PersistedState): FrontierState {
    return {
      visited: new Set(data.visited),
      fileCount: data.file_count,
      failedAttempts: new Map(Object.entries(data.failed_attempts ?? {})),
    };
  }
}

// fs errors are not instances of the test runner's Error, so only the code is checked
function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
