import { BannerPresenter, BannerStyle } from '../../core/collaborators';

interface Writer {
  write(chunk: string): unknown;
}

export class TerminalBannerPresenter implements BannerPresenter {
  public constructor(
    private readonly writer: Writer = process.stderr,
    private readonly prefix = 'voxpipe'
  ) {}

  public show(message: string, style: BannerStyle): void {
    const label = style === 'error' ? 'error' : 'info';
    this.writer.write(`\n[${this.prefix}] ${label}: ${message}\n`);
  }
}
