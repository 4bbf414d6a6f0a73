/**
 * Structured logging bound to a sync run.
 */

const LEVELS: Record<string, number> = {
  trace: 0,
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

const REDACTED = '***REDACTED***';

export interface WritableOutput {
  write(s: string): void;
}

export interface ContextLoggerOptions {
  name?: string;
  format?: 'json' | 'text';
  level?: string;
  redactSensitive?: boolean;
  output?: WritableOutput;
}

export class ContextLogger {
  private _name: string;
  private _format: 'json' | 'text';
  private _level: string;
  private _levelValue: number;
  private _redactSensitive: boolean;
  private _output: WritableOutput;
  private _runId: string | null = null;
  private _ownerType: string | null = null;

  constructor(options?: ContextLoggerOptions) {
    this._name = options?.name ?? 'collection-sync';
    this._format = options?.format ?? 'json';
    this._level = options?.level ?? 'info';
    this._levelValue = LEVELS[this._level] ?? 20;
    this._redactSensitive = options?.redactSensitive ?? true;
    this._output = options?.output ?? { write: (s: string) => process.stderr.write(s) };
  }

  get level(): string {
    return this._level;
  }

  get runId(): string | null {
    return this._runId;
  }

  /** A logger sharing this one's output and settings, bound to a run and/or owner type. */
  child(bindings: { name?: string; runId?: string | null; ownerType?: string | null }): ContextLogger {
    const logger = new ContextLogger({
      name: bindings.name ?? this._name,
      format: this._format,
      level: this._level,
      redactSensitive: this._redactSensitive,
      output: this._output,
    });
    logger._runId = bindings.runId !== undefined ? bindings.runId : this._runId;
    logger._ownerType = bindings.ownerType !== undefined ? bindings.ownerType : this._ownerType;
    return logger;
  }

  private _emit(levelName: string, message: string, extra?: Record<string, unknown> | null): void {
    const levelValue = LEVELS[levelName] ?? 20;
    if (levelValue < this._levelValue) return;

    let redactedExtra: Record<string, unknown> | null = extra ?? null;
    if (extra != null && this._redactSensitive) {
      redactedExtra = {};
      for (const [k, v] of Object.entries(extra)) {
        redactedExtra[k] = k.startsWith('_secret_') ? REDACTED : v;
      }
    }

    const now = new Date();
    const entry: Record<string, unknown> = {
      timestamp: now.toISOString(),
      level: levelName,
      message,
      run_id: this._runId,
      owner_type: this._ownerType,
      logger: this._name,
      extra: redactedExtra,
    };

    if (this._format === 'json') {
      this._output.write(JSON.stringify(entry) + '\n');
    } else {
      const ts = now.toISOString().replace('T', ' ').replace(/\.\d+Z$/, '');
      const lvl = levelName.toUpperCase();
      const run = this._runId ?? 'none';
      const owner = this._ownerType ?? 'none';
      let extrasStr = '';
      if (redactedExtra) {
        extrasStr = ' ' + Object.entries(redactedExtra).map(([k, v]) => `${k}=${formatValue(v)}`).join(' ');
      }
      this._output.write(`${ts} [${lvl}] [run=${run}] [owner=${owner}] ${message}${extrasStr}\n`);
    }
  }

  trace(message: string, extra?: Record<string, unknown>): void {
    this._emit('trace', message, extra);
  }

  debug(message: string, extra?: Record<string, unknown>): void {
    this._emit('debug', message, extra);
  }

  info(message: string, extra?: Record<string, unknown>): void {
    this._emit('info', message, extra);
  }

  warn(message: string, extra?: Record<string, unknown>): void {
    this._emit('warn', message, extra);
  }

  error(message: string, extra?: Record<string, unknown>): void {
    this._emit('error', message, extra);
  }

  fatal(message: string, extra?: Record<string, unknown>): void {
    this._emit('fatal', message, extra);
  }
}

function formatValue(v: unknown): string {
  return typeof v === 'object' && v !== null ? JSON.stringify(v) : String(v);
}

/** Output sink that keeps lines in memory. */
export class MemoryOutput implements WritableOutput {
  readonly lines: string[] = [];

  write(s: string): void {
    this.lines.push(s.replace(/\n$/, ''));
  }

  entries(): Array<Record<string, unknown>> {
    const result: Array<Record<string, unknown>> = [];
    for (const line of this.lines) {
      const parsed: unknown = JSON.parse(line);
      if (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)) {
        result.push({ ...parsed });
      }
    }
    return result;
  }
}

/** Logger that discards everything. */
export function silentLogger(): ContextLogger {
  return new ContextLogger({ level: 'fatal', output: { write: () => undefined } });
}
