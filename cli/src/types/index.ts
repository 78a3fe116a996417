export interface FilePicker {
  /** Resolves to the chosen input path; rejects with UserCancelledError when nothing is picked. */
  pick(): Promise<string>;
}

export interface FileCleanStats {
  lines: number;
  escapesRemoved: number;
  glyphsReplaced: number;
}

export interface RunSummary extends FileCleanStats {
  inputPath: string;
  outputPath: string;
  durationMs: number;
}
