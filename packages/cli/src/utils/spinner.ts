import ora, { type Ora } from 'ora';

/** ora spinner on stderr; animation only when stderr is a TTY. */
export class Spinner {
  private readonly ora: Ora;

  constructor(message = 'Transferring...') {
    this.ora = ora({ text: message, spinner: 'dots', isEnabled: process.stderr.isTTY === true });
  }

  start(): void {
    this.ora.start();
  }

  update(message: string): void {
    this.ora.text = message;
  }

  stop(): void {
    this.ora.stop();
  }
}
