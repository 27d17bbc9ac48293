/**
 * Configuration types for clidef
 */

export interface ClidefConfig {
  http?: HttpConfig;
  format?: FormatConfig;
  build?: BuildConfig;
}

export interface HttpConfig {
  timeout?: string | number; // e.g., "30s" or 30000
}

export interface FormatConfig {
  enabled?: boolean; // Run prettier over generated source (default true)
  printWidth?: number;
}

export interface BuildConfig {
  target?: string; // esbuild target, e.g. "node20"
  minify?: boolean;
}

/**
 * Runtime configuration after defaults and parsing
 */
export interface ResolvedConfig {
  http: {
    timeoutMs: number;
  };
  format: {
    enabled: boolean;
    printWidth: number;
  };
  build: {
    target: string;
    minify: boolean;
  };
}
