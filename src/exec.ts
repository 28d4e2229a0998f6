import { spawn } from 'child_process';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CancelledError, ManagerNotFoundError } from './errors';
import { ProcessResult, RunOptions } from './types';

/**
 * Runs a process to completion and captures its output. A non-zero exit is a
 * result, not an error; failing to start the process at all is.
 */
export function runProcess(file: string, args: string[], options: RunOptions = {}): Promise<ProcessResult> {
  return new Promise((resolve, reject) => {
    if (options.signal?.aborted) {
      reject(new CancelledError());
      return;
    }

    const child = spawn(file, args, {
      cwd: options.cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
      signal: options.signal,
    });

    let stdout = '';
    let stderr = '';
    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => (stdout += chunk));
    child.stderr.on('data', (chunk: string) => (stderr += chunk));

    child.on('error', (err: NodeJS.ErrnoException) => {
      if (err.name === 'AbortError') {
        reject(new CancelledError());
      } else if (err.code === 'ENOENT' || err.code === 'EACCES') {
        reject(new ManagerNotFoundError(`Failed to run '${file}': ${err.message}`));
      } else {
        reject(err);
      }
    });
    child.on('close', (code) => {
      if (options.signal?.aborted) {
        reject(new CancelledError());
        return;
      }
      resolve({ code: code ?? 1, stdout, stderr });
    });
  });
}

/** Runs the user's command attached to the terminal and resolves with its exit code. */
export function runInteractive(file: string, args: string[], options: RunOptions = {}): Promise<number> {
  return new Promise((resolve, reject) => {
    const child = spawn(file, args, { cwd: options.cwd, stdio: 'inherit' });
    child.on('error', (err: NodeJS.ErrnoException) => {
      reject(
        err.code === 'ENOENT' ? new ManagerNotFoundError(`Failed to run '${file}': ${err.message}`) : err,
      );
    });
    child.on('close', (code, signal) => {
      resolve(code ?? (signal ? 128 + os.constants.signals[signal] : 1));
    });
  });
}

function isExecutableFile(candidate: string): boolean {
  try {
    const stats = fs.statSync(candidate);
    if (!stats.isFile()) return false;
    fs.accessSync(candidate, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/** Looks a program name up on PATH the way a shell would. */
export function which(name: string, env: NodeJS.ProcessEnv = process.env): string | null {
  if (name.includes(path.sep)) {
    return isExecutableFile(name) ? path.resolve(name) : null;
  }
  const dirs = (env.PATH ?? '').split(path.delimiter).filter(Boolean);
  const exts = process.platform === 'win32' ? (env.PATHEXT ?? '.EXE;.CMD;.BAT').split(';') : [''];
  for (const dir of dirs) {
    for (const ext of exts) {
      const candidate = path.join(dir, name + ext);
      if (isExecutableFile(candidate)) return candidate;
    }
  }
  return null;
}
