import type { Notifier } from '../../telegram/notifier.js';

export class RecordingNotifier implements Notifier {
  readonly sent: string[] = [];

  async send(text: string): Promise<void> {
    this.sent.push(text);
  }
}
