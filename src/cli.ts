#!/usr/bin/env node
import { parseArgs, USAGE } from './args.js';
import { loadConfig } from './config.js';
import { convertFile, generateSite } from './site.js';
import { createApp, startServer } from './server.js';
import { loadTemplate } from './template.js';

function run(): void {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return;
  }

  const config = loadConfig(args.overrides);
  const template = loadTemplate(config.templatePath);

  if (args.file) {
    const { outputPath, warnings } = convertFile(args.file, undefined, template);
    for (const warning of warnings) {
      console.warn(`${args.file}: ${warning}`);
    }
    console.log(`Wrote ${outputPath}`);
    return;
  }

  console.log(`Generating site from: ${config.rootDir}`);
  const report = generateSite({ rootDir: config.rootDir, outDir: config.outDir, template });
  const homepages = report.pages.filter(p => p.kind === 'homepage').length;
  console.log(`Wrote ${report.pages.length} pages (${homepages} homepages) to ${config.outDir}`);

  if (report.errors.length > 0) {
    console.warn('Warnings:', report.errors);
  }

  if (args.serve) {
    const app = createApp({ rootDir: config.rootDir, report }, { outDir: config.outDir });
    startServer(app, config.port);
  }
}

try {
  run();
} catch (err) {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
}
