import { ioError, type PipelineError } from "../common/errors.js";
import { err, ok, type Result } from "../common/result.js";
import type { LogStream } from "../logger.js";
import { ConsoleTransport } from "../transports/console.js";
import { FileTransport } from "../transports/file.js";
import type { LogSink, ReportTransport, RunConfig } from "../types.js";

export interface CreateTransportsOptions {
  stdout?: LogStream;
}

export function createTransports(
  config: RunConfig,
  options: CreateTransportsOptions = {},
): ReportTransport[] {
  const transports: ReportTransport[] = [new FileTransport(config.outputPath)];
  if (config.console) {
    transports.push(new ConsoleTransport(options.stdout));
  }
  return transports;
}

/** Sends the report through each transport in order, stopping at the first failure. */
export async function publishReport(
  text: string,
  transports: readonly ReportTransport[],
  logger: LogSink,
): Promise<Result<string[], PipelineError>> {
  const published: string[] = [];
  for (const transport of transports) {
    try {
      await transport.sendReport(text);
    } catch (error) {
      return err(ioError("publish report via", transport.name, error));
    }
    logger.debug(`Report sent via ${transport.name}`);
    published.push(transport.name);
  }
  return ok(published);
}
