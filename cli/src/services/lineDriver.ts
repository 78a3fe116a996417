import { promises as fs } from "fs";
import type { FileHandle } from "fs/promises";
import { cleanLines } from "@shared/textCleaner";
import { IoError, InvalidEncodingError, type IoOperation } from "../utils/errors";
import type { FileCleanStats } from "../types";

const LINE_TERMINATOR = "\n";
const LF = 0x0a;
const CR = 0x0d;

async function openInput(inputPath: string): Promise<FileHandle> {
  try {
    return await fs.open(inputPath, "r");
  } catch (error) {
    throw new IoError("open", inputPath, error);
  }
}

async function createOutput(outputPath: string): Promise<FileHandle> {
  try {
    return await fs.open(outputPath, "w");
  } catch (error) {
    throw new IoError("create", outputPath, error);
  }
}

/**
 * Yield the file's lines without terminators, each decoded as strict UTF-8.
 * A `\r` directly before `\n` is dropped; a trailing newline does not start an extra line.
 */
export async function* readLines(handle: FileHandle, inputPath: string): AsyncGenerator<string> {
  const decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });
  let lineNumber = 0;
  let pending: Buffer = Buffer.alloc(0);

  const decodeLine = (bytes: Uint8Array): string => {
    lineNumber++;
    try {
      return decoder.decode(bytes);
    } catch (error) {
      throw new InvalidEncodingError(inputPath, lineNumber, error);
    }
  };

  const stream = handle.createReadStream({ autoClose: false });
  const chunks: AsyncIterator<Buffer> = stream[Symbol.asyncIterator]();

  try {
    for (;;) {
      let next: IteratorResult<Buffer>;
      try {
        next = await chunks.next();
      } catch (error) {
        throw new IoError("read", inputPath, error);
      }
      if (next.done) break;

      pending = pending.length > 0 ? Buffer.concat([pending, next.value]) : next.value;

      let start = 0;
      let newline = pending.indexOf(LF);
      while (newline !== -1) {
        const end = newline > start && pending[newline - 1] === CR ? newline - 1 : newline;
        yield decodeLine(pending.subarray(start, end));
        start = newline + 1;
        newline = pending.indexOf(LF, start);
      }
      pending = pending.subarray(start);
    }

    if (pending.length > 0) {
      yield decodeLine(pending);
    }
  } finally {
    stream.destroy();
  }
}

/**
 * Close `handle` after `work`. A close failure only surfaces when `work` succeeded;
 * otherwise the error from `work` is the one rethrown.
 */
async function useHandle<T>(
  handle: FileHandle,
  operation: IoOperation,
  filePath: string,
  work: () => Promise<T>
): Promise<T> {
  let result: T;
  try {
    result = await work();
  } catch (error) {
    await handle.close().catch(() => undefined);
    throw error;
  }

  try {
    await handle.close();
  } catch (error) {
    throw new IoError(operation, filePath, error);
  }
  return result;
}

/**
 * Clean `inputPath` line by line into `outputPath`, overwriting it.
 * Output order matches input order; whatever was written before a failure stays on disk.
 */
export async function cleanFile(inputPath: string, outputPath: string): Promise<FileCleanStats> {
  const input = await openInput(inputPath);

  return useHandle(input, "read", inputPath, async () => {
    const output = await createOutput(outputPath);
    const stats: FileCleanStats = { lines: 0, escapesRemoved: 0, glyphsReplaced: 0 };

    return useHandle(output, "write", outputPath, async () => {
      for await (const result of cleanLines(readLines(input, inputPath))) {
        try {
          await output.write(result.text + LINE_TERMINATOR);
        } catch (error) {
          throw new IoError("write", outputPath, error);
        }
        stats.lines++;
        stats.escapesRemoved += result.escapesRemoved;
        stats.glyphsReplaced += result.glyphsReplaced;
      }
      return stats;
    });
  });
}
