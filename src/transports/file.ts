import { writeFile } from "node:fs/promises";
import type { ReportTransport } from "../types.js";

export class FileTransport implements ReportTransport {
  readonly name: string;

  constructor(private readonly path: string) {
    this.name = `file:${path}`;
  }

  /** Overwrites the destination; the parent directory must already exist. */
  async sendReport(text: string): Promise<void> {
    await writeFile(this.path, `${text}\n`, { encoding: "utf8", flag: "w" });
  }
}
