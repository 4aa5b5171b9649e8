/**
 * Runs the binary inspection tool (cuobjdump) against a shared library.
 */

import { execFile } from 'child_process';
import { CatalogError, ErrorCodes } from './errors.js';

export interface ExecResult {
  stdout: string;
  stderr: string;
}

export interface ExecOptions {
  maxBuffer: number;
  /** Kills the process when aborted */
  signal?: AbortSignal;
}

export type ExecFn = (file: string, args: string[], options: ExecOptions) => Promise<ExecResult>;

/**
 * Failure of a spawned process. `code` is the exit code, or an errno
 * string such as `ENOENT` when the process could not start.
 */
export class ExecError extends Error {
  constructor(
    message: string,
    public readonly code: string | number | undefined,
    public readonly stdout = '',
    public readonly stderr = ''
  ) {
    super(message);
    this.name = 'ExecError';
  }
}

export const execTool: ExecFn = (file, args, options) =>
  new Promise((resolvePromise, reject) => {
    execFile(
      file,
      args,
      { maxBuffer: options.maxBuffer, signal: options.signal, encoding: 'utf8' },
      (error, stdout, stderr) => {
        if (error) {
          const code: unknown = Reflect.get(error, 'code');
          reject(
            new ExecError(
              error.message,
              typeof code === 'string' || typeof code === 'number' ? code : undefined,
              stdout,
              stderr
            )
          );
          return;
        }
        resolvePromise({ stdout, stderr });
      }
    );
  });

/**
 * Split a command line into argv. Whitespace separates words; single
 * and double quotes group them.
 */
export function splitCommand(command: string): string[] {
  const args: string[] = [];
  let current = '';
  let quote: '"' | "'" | null = null;
  let pending = false;

  for (const char of command) {
    if (quote) {
      if (char === quote) {
        quote = null;
      } else {
        current += char;
      }
    } else if (char === '"' || char === "'") {
      quote = char;
      pending = true;
    } else if (/\s/.test(char)) {
      if (pending) {
        args.push(current);
        current = '';
        pending = false;
      }
    } else {
      current += char;
      pending = true;
    }
  }

  if (quote) {
    throw new CatalogError(ErrorCodes.CONFIG_SCHEMA_ERROR, `Unterminated quote in inspector command: ${command}`);
  }
  if (pending) args.push(current);
  return args;
}

export interface InspectorOptions {
  command: string;
  maxBuffer: number;
  exec?: ExecFn;
  signal?: AbortSignal;
}

/**
 * Run the inspector with `libraryPath` as its last argument and return
 * its stdout.
 */
export async function runInspector(libraryPath: string, options: InspectorOptions): Promise<string> {
  const [file, ...args] = splitCommand(options.command);
  if (!file) {
    throw new CatalogError(ErrorCodes.CONFIG_SCHEMA_ERROR, 'Inspector command is empty');
  }

  const exec = options.exec ?? execTool;
  try {
    const result = await exec(file, [...args, libraryPath], {
      maxBuffer: options.maxBuffer,
      ...(options.signal ? { signal: options.signal } : {}),
    });
    return result.stdout;
  } catch (error) {
    if (options.signal?.aborted) throw error;
    if (error instanceof ExecError && error.code === 'ENOENT') {
      throw new CatalogError(ErrorCodes.INSPECT_TOOL_NOT_FOUND, `Inspector not found: ${file}`, {
        details: { command: options.command },
      });
    }

    const stderr = error instanceof ExecError ? error.stderr.trim() : '';
    const stdout = error instanceof ExecError ? error.stdout : '';
    throw new CatalogError(
      ErrorCodes.INSPECT_FAILED,
      `${file} failed on ${libraryPath}${stderr ? `: ${stderr.split('\n')[0]}` : ''}`,
      {
        details: { command: options.command, library: libraryPath, stderr, stdoutLength: stdout.length },
        ...(error instanceof Error ? { cause: error } : {}),
      }
    );
  }
}
