import { promises as fs } from "fs";
import path from "path";
import { createInterface } from "readline";
import { UserCancelledError } from "../utils/errors";
import type { FilePicker } from "../types";

export interface FilePickerOptions {
  cwd: string;
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

const TEXT_EXTENSION = ".txt";
const PROMPT = "File number or path (empty to cancel): ";

function isTextFileName(name: string): boolean {
  return path.extname(name).toLowerCase() === TEXT_EXTENSION;
}

async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
}

export async function listTextFiles(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && isTextFileName(entry.name))
    .map((entry) => entry.name)
    .sort((a, b) => a.localeCompare(b));
}

/**
 * Terminal stand-in for a native "open file" dialog, limited to .txt files.
 */
export function createFilePicker(options: FilePickerOptions): FilePicker {
  const { cwd, input, output } = options;

  return {
    async pick(): Promise<string> {
      const candidates = await listTextFiles(cwd);

      output.write(`Select Input File (${cwd})\n`);
      if (candidates.length === 0) {
        output.write("  no .txt files here; type a path instead\n");
      }
      candidates.forEach((name, index) => {
        output.write(`  ${index + 1}) ${name}\n`);
      });

      const rl = createInterface({ input, output, terminal: false });
      const answers = rl[Symbol.asyncIterator]();

      try {
        for (;;) {
          output.write(PROMPT);
          const next = await answers.next();
          const answer = next.done ? "" : next.value.trim();

          if (answer === "") {
            throw new UserCancelledError();
          }

          if (/^\d+$/.test(answer)) {
            const choice = Number(answer);
            if (choice >= 1 && choice <= candidates.length) {
              return path.resolve(cwd, candidates[choice - 1]);
            }
            output.write(`No file numbered ${choice}\n`);
            continue;
          }

          const resolved = path.resolve(cwd, answer);
          if (!isTextFileName(resolved)) {
            output.write(`Only ${TEXT_EXTENSION} files can be selected\n`);
            continue;
          }
          if (!(await isRegularFile(resolved))) {
            output.write(`Not a file: ${resolved}\n`);
            continue;
          }
          return resolved;
        }
      } finally {
        rl.close();
      }
    },
  };
}
