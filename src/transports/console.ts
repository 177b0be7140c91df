import type { ReportTransport } from "../types.js";
import type { LogStream } from "../logger.js";

export class ConsoleTransport implements ReportTransport {
  readonly name = "console";

  constructor(private readonly stream: LogStream = process.stdout) {}

  async sendReport(text: string): Promise<void> {
    this.stream.write(`${text}\n`);
  }
}
