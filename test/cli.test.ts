import test from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { EXIT_FAILURE, EXIT_SUCCESS, runCli, withFixedDataset } from "../src/app.js";

function captureStream(): { chunks: string[]; write: (chunk: string) => number } {
  const chunks: string[] = [];
  return { chunks, write: (chunk: string) => chunks.push(chunk) };
}

async function withDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(join(tmpdir(), "analysis-cli-"));
  try {
    await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

test("runCli publishes the election report and exits with success", async () => {
  await withDir(async (dir) => {
    const input = join(dir, "election.csv");
    const output = join(dir, "election.txt");
    await writeFile(input, "Ballot ID,County,Candidate\n1,A,X\n2,A,Y\n3,B,X\n", "utf8");
    const stdout = captureStream();
    const stderr = captureStream();

    const code = await runCli(["--dataset", "election", "--input", input, "--output", output], {
      env: {},
      stdout,
      stderr,
    });

    assert.equal(code, EXIT_SUCCESS);
    const written = await readFile(output, "utf8");
    assert.deepEqual(stdout.chunks, [written]);
    assert.ok(written.endsWith("Winner: X\n-------------------------\n"));
    assert.deepEqual(stderr.chunks, []);
  });
});

test("runCli logs the failure with its kind and returns the failure code", async () => {
  await withDir(async (dir) => {
    const stdout = captureStream();
    const stderr = captureStream();
    const code = await runCli(["--dataset", "budget", "--input", join(dir, "absent.csv")], {
      env: {},
      stdout,
      stderr,
    });

    assert.equal(code, EXIT_FAILURE);
    assert.equal(code, -1);
    assert.deepEqual(stdout.chunks, []);
    assert.equal(stderr.chunks.length, 1);
    assert.match(stderr.chunks[0], /\[ERROR\] budget analysis failed \[io\]\n/);
  });
});

test("runCli stays silent on failure with --quiet", async () => {
  await withDir(async (dir) => {
    const stderr = captureStream();
    const code = await runCli(
      ["--dataset", "budget", "--input", join(dir, "absent.csv"), "--quiet"],
      { env: {}, stdout: captureStream(), stderr },
    );
    assert.equal(code, EXIT_FAILURE);
    assert.deepEqual(stderr.chunks, []);
  });
});

test("runCli rejects an unknown dataset", async () => {
  const stderr = captureStream();
  const code = await runCli(["--dataset", "payroll"], { env: {}, stdout: captureStream(), stderr });
  assert.equal(code, EXIT_FAILURE);
  assert.equal(stderr.chunks.length, 1);
  assert.match(stderr.chunks[0], /\[ERROR\] Invalid configuration: /);
});

test("runCli keeps a fixed dataset over a user-supplied one", async () => {
  await withDir(async (dir) => {
    const input = join(dir, "budget.csv");
    const output = join(dir, "budget.txt");
    await writeFile(input, "Date,Profit/Losses\nJan,1000\nFeb,1500\nMar,1200\n", "utf8");
    const stdout = captureStream();

    const argv = withFixedDataset(
      ["--dataset", "election", "--input", input, "--output", output],
      "budget",
    );
    const code = await runCli(argv, { env: {}, stdout, stderr: captureStream() });

    assert.equal(code, EXIT_SUCCESS);
    assert.equal(stdout.chunks.length, 1);
    assert.ok(stdout.chunks[0].startsWith("Financial Analysis\n"));
    assert.equal(await readFile(output, "utf8"), stdout.chunks[0]);
  });
});
