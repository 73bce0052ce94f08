import { parsePort, SiteConfig } from './config.js';

export const USAGE = 'Usage: mdfolio [--root=DIR] [--out=DIR] [--template=FILE] [--file=FILE.md] [--serve] [--port=N]';

/**
 * Parsed command line
 */
export interface CliArgs {
  overrides: Partial<SiteConfig>;
  /** Convert this single file instead of the whole site */
  file?: string;
  serve: boolean;
  help: boolean;
}

/**
 * Value of the first `--name=value` flag
 */
export function flagValue(args: readonly string[], name: string): string | undefined {
  const arg = args.find(a => a.startsWith(`--${name}=`));
  return arg ? arg.slice(name.length + 3) : undefined;
}

export function parseArgs(args: readonly string[]): CliArgs {
  const port = flagValue(args, 'port');
  return {
    overrides: {
      rootDir: flagValue(args, 'root'),
      outDir: flagValue(args, 'out'),
      templatePath: flagValue(args, 'template'),
      port: port === undefined ? undefined : parsePort(port, '--port')
    },
    file: flagValue(args, 'file'),
    serve: args.includes('--serve'),
    help: args.includes('--help') || args.includes('-h')
  };
}
