/**
 * Script execution.
 *
 * The dispatcher only sees the ScriptExecutor interface. The bundled
 * CommandScriptExecutor runs a restricted line-oriented script: one command
 * per line, each started without a shell, and only when its executable is
 * on the configured allow-list.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { errorMessage } from '../../_shared/ts/errors';
import { componentLogger } from '../../_shared/ts/logger';
import type { GatewayConfig } from './config';

const execFileAsync = promisify(execFile);

// ─── Types ──────────────────────────────────────────────────────────────────

export interface ScriptExecutionResult {
  success: boolean;
  output: string[];
  error?: string;
  workingDir: string;
  durationMs: number;
}

/** Runs a script in a directory; failures are reported in the result, not thrown */
export interface ScriptExecutor {
  execute(script: string, workingDir: string): Promise<ScriptExecutionResult>;
}

export interface CommandScriptExecutorOptions {
  /** Executables that may be started, matched exactly as written in the script */
  allowedCommands: readonly string[];
  timeoutMs: number;
  /** Per-command stdout/stderr cap */
  maxBufferBytes?: number;
}

// ─── Parsing ────────────────────────────────────────────────────────────────

/**
 * Split one command line into arguments.
 *
 * Whitespace separates arguments; single quotes are literal; inside double
 * quotes a backslash escapes `"` and `\`.
 *
 * @example
 * splitCommandLine(`git commit -m "first draft"`) // ['git', 'commit', '-m', 'first draft']
 */
export function splitCommandLine(line: string): string[] {
  const args: string[] = [];
  let current = '';
  let quote: '"' | "'" | null = null;
  let pending = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];

    if (quote === "'") {
      if (ch === "'") quote = null;
      else current += ch;
      continue;
    }

    if (quote === '"') {
      if (ch === '"') {
        quote = null;
      } else if (ch === '\\' && (line[i + 1] === '"' || line[i + 1] === '\\')) {
        current += line[i + 1];
        i++;
      } else {
        current += ch;
      }
      continue;
    }

    if (ch === '"' || ch === "'") {
      quote = ch;
      pending = true;
    } else if (/\s/.test(ch)) {
      if (pending) {
        args.push(current);
        current = '';
        pending = false;
      }
    } else {
      current += ch;
      pending = true;
    }
  }

  if (quote !== null) {
    throw new Error(`Unterminated ${quote} quote`);
  }
  if (pending) args.push(current);
  return args;
}

/** Executable lines of a script: blank lines and `#` comments dropped */
export function scriptLines(script: string): string[] {
  return script
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

function outputLines(text: string): string[] {
  return text.split(/\r?\n/).filter((line) => line.length > 0);
}

/** stdout/stderr captured on a failed child process, when present */
function capturedOutput(err: unknown, stream: 'stdout' | 'stderr'): string {
  if (typeof err !== 'object' || err === null || !(stream in err)) return '';
  const value: unknown = Reflect.get(err, stream);
  return typeof value === 'string' ? value : '';
}

// ─── CommandScriptExecutor ──────────────────────────────────────────────────

export class CommandScriptExecutor implements ScriptExecutor {
  private readonly allowed: ReadonlySet<string>;
  private readonly timeoutMs: number;
  private readonly maxBufferBytes: number;
  private readonly log = componentLogger('script');

  constructor(options: CommandScriptExecutorOptions) {
    this.allowed = new Set(options.allowedCommands);
    this.timeoutMs = options.timeoutMs;
    this.maxBufferBytes = options.maxBufferBytes ?? 1024 * 1024;
  }

  static fromConfig(config: GatewayConfig): CommandScriptExecutor {
    return new CommandScriptExecutor({
      allowedCommands: config.scriptCommands,
      timeoutMs: config.scriptTimeoutMs,
    });
  }

  /** Whether `command` may be started */
  isAllowed(command: string): boolean {
    return this.allowed.has(command);
  }

  async execute(script: string, workingDir: string): Promise<ScriptExecutionResult> {
    const started = Date.now();
    const output: string[] = [];
    const finish = (success: boolean, error?: string): ScriptExecutionResult => {
      const result: ScriptExecutionResult = { success, output, workingDir, durationMs: Date.now() - started };
      if (error !== undefined) result.error = error;
      return result;
    };

    const lines = scriptLines(script);
    if (lines.length === 0) {
      return finish(false, 'Script contains no commands');
    }

    for (const [index, line] of lines.entries()) {
      let args: string[];
      try {
        args = splitCommandLine(line);
      } catch (err) {
        return finish(false, `Line ${index + 1}: ${errorMessage(err)}`);
      }

      const [command, ...rest] = args;
      if (command === undefined) continue;
      if (!this.isAllowed(command)) {
        this.log.warn(`Blocked command: ${command}`);
        return finish(false, `Line ${index + 1}: command not allowed: ${command}`);
      }

      this.log.debug(`Running ${command} in ${workingDir}`, { args: rest.length });
      try {
        const { stdout, stderr } = await execFileAsync(command, rest, {
          cwd: workingDir,
          timeout: this.timeoutMs,
          maxBuffer: this.maxBufferBytes,
          windowsHide: true,
        });
        output.push(...outputLines(stdout), ...outputLines(stderr));
      } catch (err) {
        output.push(...outputLines(capturedOutput(err, 'stdout')), ...outputLines(capturedOutput(err, 'stderr')));
        return finish(false, `Line ${index + 1}: ${command} failed: ${errorMessage(err)}`);
      }
    }

    return finish(true);
  }
}
