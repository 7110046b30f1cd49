import { SoundCue, SoundPlayer } from '../../core/collaborators';
import { StructuredLogger } from '../../logging/StructuredLogger';
import { CommandRunner, runCommand } from '../process/runCommand';

export interface SystemSoundPlayerOptions {
  enabled: boolean;
  platform?: NodeJS.Platform;
  commandRunner?: CommandRunner;
  /** Written when no player command is available. */
  bell?: { write(chunk: string): unknown };
}

const MAC_SOUNDS: Record<SoundCue, string> = {
  start: '/System/Library/Sounds/Tink.aiff',
  stop: '/System/Library/Sounds/Glass.aiff',
  cancel: '/System/Library/Sounds/Pop.aiff',
  error: '/System/Library/Sounds/Basso.aiff'
};

const FREEDESKTOP_SOUNDS: Record<SoundCue, string> = {
  start: '/usr/share/sounds/freedesktop/stereo/message.oga',
  stop: '/usr/share/sounds/freedesktop/stereo/complete.oga',
  cancel: '/usr/share/sounds/freedesktop/stereo/dialog-information.oga',
  error: '/usr/share/sounds/freedesktop/stereo/dialog-error.oga'
};

const PLAY_TIMEOUT_MS = 5000;

export class SystemSoundPlayer implements SoundPlayer {
  private readonly platform: NodeJS.Platform;
  private readonly runner: CommandRunner;
  private bellFallback = false;

  public constructor(
    private readonly options: SystemSoundPlayerOptions,
    private readonly logger?: StructuredLogger
  ) {
    this.platform = options.platform ?? process.platform;
    this.runner = options.commandRunner ?? runCommand;
  }

  /** Fire and forget; failures are logged and later cues fall back to the terminal bell. */
  public play(cue: SoundCue): void {
    if (!this.options.enabled) {
      return;
    }

    if (this.bellFallback) {
      this.ringBell();
      return;
    }

    const isMac = this.platform === 'darwin';
    const command = isMac ? 'afplay' : 'paplay';
    const soundFile = isMac ? MAC_SOUNDS[cue] : FREEDESKTOP_SOUNDS[cue];

    this.runner(command, [soundFile], { timeoutMs: PLAY_TIMEOUT_MS }).catch((error: unknown) => {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger?.warn('Sound cue failed; using the terminal bell from now on', {
        cue,
        command,
        detail
      });
      this.bellFallback = true;
      this.ringBell();
    });
  }

  private ringBell(): void {
    (this.options.bell ?? process.stdout).write('\x07');
  }
}
