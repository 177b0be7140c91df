import { readFile } from "node:fs/promises";
import Papa from "papaparse";
import { ioError, PipelineError } from "../common/errors.js";
import { err, ok, type Result } from "../common/result.js";
import { stripByteOrderMark } from "../normalize.js";
import type { LogSink } from "../types.js";

export interface LoadCsvOptions {
  arity: number;
  logger: LogSink;
}

/**
 * Reads a comma-delimited file and returns its data rows. The first row is
 * the header and is discarded; every remaining row must carry `arity` fields.
 */
export async function loadCsvRows(
  path: string,
  options: LoadCsvOptions,
): Promise<Result<string[][], PipelineError>> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    return err(ioError("read", path, error));
  }

  const parsed = Papa.parse<string[]>(stripByteOrderMark(text), {
    delimiter: ",",
    skipEmptyLines: true,
  });
  const firstError = parsed.errors[0];
  if (firstError) {
    const line = typeof firstError.row === "number" ? ` at row ${firstError.row + 1}` : "";
    return err(
      new PipelineError("parse", `Malformed CSV in ${path}${line}: ${firstError.message}`, {
        path,
      }),
    );
  }

  const [header, ...rows] = parsed.data;
  if (!header) {
    return err(new PipelineError("parse", `Missing header row in ${path}`, { path }));
  }
  options.logger.debug(`Loaded ${path}: header=[${header.join(", ")}] rows=${rows.length}`);

  for (let index = 0; index < rows.length; index += 1) {
    const row = rows[index];
    if (row.length !== options.arity) {
      return err(
        new PipelineError(
          "parse",
          `Expected ${options.arity} fields in data row ${index + 1} of ${path}, got ${row.length}`,
          { path },
        ),
      );
    }
  }
  return ok(rows);
}
