import path from "path";

const OUTPUT_SUFFIX = "_output.txt";
const FALLBACK_OUTPUT_NAME = `output${OUTPUT_SUFFIX}`;

/**
 * `notes.txt` -> `notes_output.txt` beside the input.
 * Paths without a usable file name get `output_output.txt` appended instead.
 */
export function deriveOutputPath(inputPath: string): string {
  const { dir, base, name } = path.parse(inputPath);

  if (base === "" || base === "." || base === ".." || name === "") {
    return path.join(inputPath, FALLBACK_OUTPUT_NAME);
  }

  return path.join(dir, `${name}${OUTPUT_SUFFIX}`);
}
