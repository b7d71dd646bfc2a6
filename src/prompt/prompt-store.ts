import * as fs from 'fs';
import * as path from 'path';
import Ajv, { JSONSchemaType } from 'ajv';
import { DEFAULT_PROMPT } from './default-prompt';
import { PromptFile, PromptLoadResult, PromptSource } from './types';
import { InvalidPromptError, PersistenceError } from '../errors';
import { logger } from '../observability/logger';

const ajv = new Ajv({ allErrors: true });

const promptFileSchema: JSONSchemaType<PromptFile> = {
  type: 'object',
  properties: {
    prompt: { type: 'string', minLength: 1, pattern: '\\S' },
  },
  required: ['prompt'],
  additionalProperties: true,
};

const validatePromptFile = ajv.compile(promptFileSchema);

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Owns the classification prompt.
 *
 * The in-memory value is authoritative for reads; every change is written to
 * the prompt file before it becomes visible. All file access is synchronous,
 * so a read-modify-persist sequence never interleaves with another request
 * on the event loop. Last writer wins.
 */
export class PromptStore implements PromptSource {
  private current: string = DEFAULT_PROMPT;
  private log = logger.child({ component: 'prompt-store' });

  constructor(readonly filePath: string) {}

  /** Create a store and adopt the persisted prompt, falling back to the default. */
  static open(filePath: string): PromptStore {
    const store = new PromptStore(filePath);
    const result = store.load();

    if (result.ok) {
      store.current = result.prompt;
      store.log.info({ filePath, chars: result.prompt.length }, 'Loaded saved prompt');
    } else if (result.reason === 'missing') {
      store.log.debug({ filePath }, 'No saved prompt; using default');
    } else {
      store.log.warn({ filePath, reason: result.reason, detail: result.detail }, 'Saved prompt unusable; using default');
    }

    return store;
  }

  /** Read and validate the prompt file. Never throws. */
  load(): PromptLoadResult {
    let raw: string;
    try {
      raw = fs.readFileSync(this.filePath, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        return { ok: false, reason: 'missing' };
      }
      return { ok: false, reason: 'unreadable', detail: describeError(err) };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      return { ok: false, reason: 'malformed', detail: describeError(err) };
    }

    if (!validatePromptFile(parsed)) {
      return { ok: false, reason: 'invalid', detail: ajv.errorsText(validatePromptFile.errors) };
    }

    return { ok: true, prompt: parsed.prompt.trim() };
  }

  getPrompt(): string {
    return this.current;
  }

  isDefault(): boolean {
    return this.current === DEFAULT_PROMPT;
  }

  setPrompt(value: string): string {
    const trimmed = typeof value === 'string' ? value.trim() : '';
    if (!trimmed) {
      throw new InvalidPromptError();
    }

    this.persist(trimmed);
    this.current = trimmed;
    this.log.info({ chars: trimmed.length }, 'Prompt updated');
    return trimmed;
  }

  resetPrompt(): string {
    this.persist(DEFAULT_PROMPT);
    this.current = DEFAULT_PROMPT;
    this.log.info('Prompt reset to default');
    return DEFAULT_PROMPT;
  }

  private persist(value: string): void {
    const payload: PromptFile = { prompt: value };
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;

    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true, mode: 0o700 });
      fs.writeFileSync(tmpPath, JSON.stringify(payload, null, 2) + '\n', { encoding: 'utf-8', mode: 0o600 });
      fs.renameSync(tmpPath, this.filePath);
    } catch (err) {
      this.removeTempFile(tmpPath);
      this.log.error({ err, filePath: this.filePath }, 'Failed to persist prompt');
      throw new PersistenceError('Failed to save prompt', { cause: err });
    }
  }

  private removeTempFile(tmpPath: string): void {
    try {
      fs.unlinkSync(tmpPath);
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return;
      this.log.warn({ err, tmpPath }, 'Failed to remove temporary prompt file');
    }
  }
}
