import { Injectable, Logger } from '@nestjs/common';
import { spawn } from 'child_process';

export const COMMAND_RUNNER = Symbol('COMMAND_RUNNER');

export interface CommandResult {
  code: number;
  stdout: Buffer;
  stderr: string;
}

export interface CommandOptions {
  input?: string | Buffer;
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
  // Discard output and resolve on exit, not on stdio close (xclip forks a child that keeps serving the selection)
  detach?: boolean;
}

export interface CommandRunner {
  run(
    command: string,
    args: string[],
    options?: CommandOptions,
  ): Promise<CommandResult>;

  /**
   * Starts a long-lived program (a GUI app) without waiting for it. Resolves
   * with its pid once the process has been spawned.
   */
  launch(command: string, args: string[], env?: NodeJS.ProcessEnv): Promise<number>;
}

@Injectable()
export class SpawnCommandRunner implements CommandRunner {
  private readonly logger = new Logger(SpawnCommandRunner.name);

  run(
    command: string,
    args: string[],
    options: CommandOptions = {},
  ): Promise<CommandResult> {
    this.logger.debug(`Running ${command} ${args.join(' ')}`);

    return new Promise<CommandResult>((resolve, reject) => {
      const child = spawn(command, args, {
        env: options.env ?? process.env,
        stdio: options.detach
          ? ['pipe', 'ignore', 'ignore']
          : ['pipe', 'pipe', 'pipe'],
        timeout: options.timeoutMs,
      });

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];

      child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));

      const finish = (code: number | null) => {
        resolve({
          code: code ?? -1,
          stdout: Buffer.concat(stdout),
          stderr: Buffer.concat(stderr).toString('utf8').trim(),
        });
      };

      child.once('error', reject);
      // A detached writer may fork a child that keeps its stdio open, so only wait for exit.
      if (options.detach) {
        child.once('exit', finish);
      } else {
        child.once('close', finish);
      }

      if (options.input !== undefined) {
        child.stdin?.write(options.input);
      }
      child.stdin?.end();
    });
  }

  launch(command: string, args: string[], env?: NodeJS.ProcessEnv): Promise<number> {
    this.logger.debug(`Launching ${command} ${args.join(' ')}`);

    return new Promise<number>((resolve, reject) => {
      const child = spawn(command, args, {
        env: env ?? process.env,
        stdio: 'ignore',
        detached: true,
      });
      child.once('error', reject);
      child.once('spawn', () => {
        child.unref();
        if (child.pid === undefined) {
          reject(new Error(`${command} started without a pid`));
          return;
        }
        resolve(child.pid);
      });
    });
  }
}
