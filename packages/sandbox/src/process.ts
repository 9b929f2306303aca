import { spawn, type ChildProcess } from 'node:child_process';

const USES_PROCESS_GROUPS = process.platform !== 'win32';

export interface RunProcessOptions {
  readonly command: string;
  readonly args: readonly string[];
  readonly timeoutMs: number;
  readonly env?: NodeJS.ProcessEnv;
  readonly cwd?: string;
}

export interface ProcessResult {
  readonly pid: number | undefined;
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;
  readonly stdout: string;
  readonly stderr: string;
  readonly timedOut: boolean;
  readonly durationMs: number;
}

/**
 * Sends SIGKILL to the child's whole process group. Returns false when there is no
 * group left to signal.
 */
const killProcessGroup = (child: ChildProcess): boolean => {
  if (!USES_PROCESS_GROUPS || child.pid === undefined) {
    return false;
  }
  try {
    process.kill(-child.pid, 'SIGKILL');
    return true;
  } catch {
    return false;
  }
};

/**
 * Spawns a process in its own process group with a wall-clock deadline. On expiry the
 * whole group is killed with SIGKILL, and whatever the child left running is killed
 * once it exits. The promise only settles once the child has exited and been reaped,
 * so no caller ever observes a still-running process. Rejects when the process cannot
 * be spawned at all.
 */
export const runProcess = (options: RunProcessOptions): Promise<ProcessResult> =>
  new Promise<ProcessResult>((resolve, reject) => {
    const startedAt = Date.now();
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let timedOut = false;
    let settled = false;

    const child = spawn(options.command, [...options.args], {
      cwd: options.cwd,
      env: options.env,
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: USES_PROCESS_GROUPS,
      windowsHide: true
    });

    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

    const releasePipes = () => {
      child.stdout.destroy();
      child.stderr.destroy();
    };

    const timer = setTimeout(() => {
      // A grandchild holding the pipes open would otherwise delay 'close' forever.
      if (child.exitCode !== null || child.signalCode !== null) {
        releasePipes();
        return;
      }
      timedOut = true;
      child.once('exit', releasePipes);
      if (!killProcessGroup(child)) {
        child.kill('SIGKILL');
      }
    }, options.timeoutMs);

    // Background processes the child started do not outlive the run.
    child.once('exit', () => killProcessGroup(child));

    child.once('error', (error) => {
      clearTimeout(timer);
      if (settled) {
        return;
      }
      settled = true;
      reject(error);
    });

    child.once('close', (exitCode, signal) => {
      clearTimeout(timer);
      if (settled) {
        return;
      }
      settled = true;
      resolve({
        pid: child.pid,
        exitCode,
        signal,
        stdout: Buffer.concat(stdout).toString('utf-8'),
        stderr: Buffer.concat(stderr).toString('utf-8'),
        timedOut,
        durationMs: Date.now() - startedAt
      });
    });
  });
