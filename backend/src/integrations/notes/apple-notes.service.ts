import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { AppConfig, IntegrationsConfig } from '../../config/index.js';
import { failure, type IntegrationResult } from '../integration.types.js';

const execFileAsync = promisify(execFile);

export interface NoteInput {
  title: string;
  body: string;
}

export type NoteResult = IntegrationResult<{ title: string; folder: string }>;

/** Escapes a value for use inside an AppleScript string literal. */
export function escapeAppleScript(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\r\n?|\n/g, '\\n');
}

export function buildNoteScript(folder: string, input: NoteInput): string {
  const title = escapeAppleScript(input.title);
  const body = escapeAppleScript(input.body);
  return [
    'tell application "Notes"',
    `  tell folder "${escapeAppleScript(folder)}"`,
    `    make new note with properties {name:"${title}", body:"${body}"}`,
    '  end tell',
    'end tell',
  ].join('\n');
}

@Injectable()
export class AppleNotesService {
  private readonly logger = new Logger(AppleNotesService.name);

  constructor(private readonly configService: ConfigService<AppConfig>) {}

  isSupported(): boolean {
    return process.platform === 'darwin';
  }

  async createNote(input: NoteInput): Promise<NoteResult> {
    if (!this.isSupported()) {
      return failure(
        `Apple Notes is only available on macOS (current platform: ${process.platform})`,
      );
    }

    const integrations =
      this.configService.getOrThrow<IntegrationsConfig>('integrations');
    const folder = integrations.notes.folder;

    try {
      await this.runScript(
        buildNoteScript(folder, input),
        integrations.timeoutMs,
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`osascript failed: ${message}`);
      return failure(`Creating the note failed: ${message}`);
    }

    this.logger.log(`Created note "${input.title}" in ${folder}`);
    return { success: true, title: input.title, folder };
  }

  async runScript(script: string, timeoutMs: number): Promise<void> {
    await execFileAsync('osascript', ['-e', script], { timeout: timeoutMs });
  }
}
