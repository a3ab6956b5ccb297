export type OutputMode = 'json' | 'pretty';

export interface CliIO {
  stdout(message: string): void;
  stderr(message: string): void;
  readFile(path: string): Promise<string>;
  /** Uniform draw in [0, 1) used for image selection. */
  random(): number;
}

export interface GlobalOptions {
  output: OutputMode;
  help: boolean;
  verbose: boolean;
}

export interface RenderFlags {
  wikiPath?: string;
  noCache: boolean;
  miserMode: boolean;
  strict?: boolean;
}
