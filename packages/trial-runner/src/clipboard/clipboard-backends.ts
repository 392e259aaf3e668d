import { promises as fsPromises } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { SetupError } from '../errors/trial-errors';
import { CommandResult, CommandRunner } from '../utils/command-runner';
import { Platform } from '../utils/platform';
import { ClipboardBackend } from './clipboard.types';

const TEXT_TARGETS = [
  'UTF8_STRING',
  'text/plain;charset=utf-8',
  'text/plain',
  'STRING',
];

function expectSuccess(result: CommandResult, what: string): void {
  if (result.code !== 0) {
    throw new Error(
      `${what} exited with code ${result.code}${result.stderr ? `: ${result.stderr}` : ''}`,
    );
  }
}

async function withTempPng<T>(
  png: Buffer,
  action: (file: string) => Promise<T>,
): Promise<T> {
  const file = path.join(
    os.tmpdir(),
    `depth-trials-clipboard-${process.pid}-${Date.now()}.png`,
  );
  await fsPromises.writeFile(file, png);
  try {
    return await action(file);
  } finally {
    await fsPromises.rm(file, { force: true });
  }
}

export class XclipClipboardBackend implements ClipboardBackend {
  readonly name = 'xclip';

  constructor(
    private readonly runner: CommandRunner,
    private readonly env: NodeJS.ProcessEnv = {
      ...process.env,
      DISPLAY: process.env.DISPLAY ?? ':0.0',
    },
  ) {}

  async checkAvailable(): Promise<void> {
    try {
      const result = await this.runner.run('xclip', ['-version'], {
        env: this.env,
      });
      expectSuccess(result, 'xclip -version');
    } catch (error) {
      throw new SetupError('xclip is required for clipboard access on Linux', {
        cause: error,
      });
    }
  }

  async readImage(): Promise<Buffer | null> {
    const targets = await this.targets();
    if (!targets.includes('image/png')) {
      return null;
    }
    const result = await this.runner.run(
      'xclip',
      ['-selection', 'clipboard', '-t', 'image/png', '-o'],
      { env: this.env },
    );
    expectSuccess(result, 'xclip read image');
    return result.stdout.length > 0 ? result.stdout : null;
  }

  async readText(): Promise<string | null> {
    const targets = await this.targets();
    if (!targets.some((target) => TEXT_TARGETS.includes(target))) {
      return null;
    }
    const result = await this.runner.run(
      'xclip',
      ['-selection', 'clipboard', '-o'],
      { env: this.env },
    );
    expectSuccess(result, 'xclip read text');
    const text = result.stdout.toString('utf8');
    return text.length > 0 ? text : null;
  }

  async writeText(text: string): Promise<void> {
    const result = await this.runner.run('xclip', ['-selection', 'clipboard'], {
      env: this.env,
      input: text,
      detach: true,
    });
    expectSuccess(result, 'xclip write text');
  }

  async writeImage(png: Buffer): Promise<void> {
    const result = await this.runner.run(
      'xclip',
      ['-selection', 'clipboard', '-t', 'image/png', '-i'],
      { env: this.env, input: png, detach: true },
    );
    expectSuccess(result, 'xclip write image');
  }

  // An empty clipboard makes xclip fail with "target TARGETS not available".
  private async targets(): Promise<string[]> {
    const result = await this.runner.run(
      'xclip',
      ['-selection', 'clipboard', '-t', 'TARGETS', '-o'],
      { env: this.env },
    );
    if (result.code !== 0) {
      return [];
    }
    return result.stdout
      .toString('utf8')
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }
}

export class MacClipboardBackend implements ClipboardBackend {
  readonly name = 'pasteboard';

  constructor(private readonly runner: CommandRunner) {}

  async checkAvailable(): Promise<void> {
    try {
      const result = await this.runner.run('osascript', ['-e', 'return 1']);
      expectSuccess(result, 'osascript');
    } catch (error) {
      throw new SetupError('osascript is required for clipboard access on macOS', {
        cause: error,
      });
    }
  }

  async readImage(): Promise<Buffer | null> {
    const result = await this.runner.run('osascript', [
      '-e',
      'the clipboard as «class PNGf»',
    ]);
    if (result.code !== 0) {
      return null;
    }
    const match = /«data PNGf([0-9A-Fa-f]+)»/.exec(
      result.stdout.toString('utf8'),
    );
    return match ? Buffer.from(match[1], 'hex') : null;
  }

  async readText(): Promise<string | null> {
    const result = await this.runner.run('pbpaste', []);
    expectSuccess(result, 'pbpaste');
    const text = result.stdout.toString('utf8');
    return text.length > 0 ? text : null;
  }

  async writeText(text: string): Promise<void> {
    const result = await this.runner.run('pbcopy', [], { input: text });
    expectSuccess(result, 'pbcopy');
  }

  async writeImage(png: Buffer): Promise<void> {
    await withTempPng(png, async (file) => {
      const escaped = file.replace(/"/g, '\\"');
      const result = await this.runner.run('osascript', [
        '-e',
        `set the clipboard to (read (POSIX file "${escaped}") as «class PNGf»)`,
      ]);
      expectSuccess(result, 'osascript set clipboard');
    });
  }
}

export class PowerShellClipboardBackend implements ClipboardBackend {
  readonly name = 'powershell';

  constructor(private readonly runner: CommandRunner) {}

  async checkAvailable(): Promise<void> {
    try {
      const result = await this.powershell('exit 0');
      expectSuccess(result, 'powershell');
    } catch (error) {
      throw new SetupError('PowerShell is required for clipboard access on Windows', {
        cause: error,
      });
    }
  }

  async readImage(): Promise<Buffer | null> {
    const result = await this.powershell(
      [
        'Add-Type -AssemblyName System.Windows.Forms',
        '$img = [System.Windows.Forms.Clipboard]::GetImage()',
        'if ($img) { $ms = New-Object IO.MemoryStream; $img.Save($ms, [System.Drawing.Imaging.ImageFormat]::Png); [Convert]::ToBase64String($ms.ToArray()) }',
      ].join('; '),
    );
    expectSuccess(result, 'powershell read image');
    const base64 = result.stdout.toString('utf8').trim();
    return base64.length > 0 ? Buffer.from(base64, 'base64') : null;
  }

  async readText(): Promise<string | null> {
    const result = await this.powershell('Get-Clipboard -Raw');
    expectSuccess(result, 'powershell read text');
    const text = result.stdout.toString('utf8').replace(/\r?\n$/, '');
    return text.length > 0 ? text : null;
  }

  async writeText(text: string): Promise<void> {
    // Base64 keeps quotes and newlines out of PowerShell's parser
    const base64Text = Buffer.from(text, 'utf-8').toString('base64');
    const result = await this.powershell(
      `[System.Text.Encoding]::UTF8.GetString([System.Convert]::FromBase64String('${base64Text}')) | Set-Clipboard`,
    );
    expectSuccess(result, 'powershell write text');
  }

  async writeImage(png: Buffer): Promise<void> {
    await withTempPng(png, async (file) => {
      const escaped = file.replace(/'/g, "''");
      const result = await this.powershell(
        [
          'Add-Type -AssemblyName System.Windows.Forms',
          'Add-Type -AssemblyName System.Drawing',
          `[System.Windows.Forms.Clipboard]::SetImage([System.Drawing.Image]::FromFile('${escaped}'))`,
        ].join('; '),
      );
      expectSuccess(result, 'powershell write image');
    });
  }

  private powershell(script: string): Promise<CommandResult> {
    return this.runner.run(
      'powershell',
      ['-NoProfile', '-STA', '-Command', script],
      { timeoutMs: 5000 },
    );
  }
}

export function createClipboardBackend(
  platform: Platform,
  runner: CommandRunner,
): ClipboardBackend {
  switch (platform) {
    case Platform.LINUX:
      return new XclipClipboardBackend(runner);
    case Platform.MACOS:
      return new MacClipboardBackend(runner);
    case Platform.WINDOWS:
      return new PowerShellClipboardBackend(runner);
    default:
      throw new SetupError(`Unsupported platform for clipboard access: ${platform}`);
  }
}
