import { existsSync, writeFileSync, statSync } from "node:fs";
import { resolve, join } from "node:path";
import { CONFIG_FILE, logger } from "@cvsskit/engine";

export interface InitOptions {
  path: string;
}

export const CONFIG_TEMPLATE = `# cvsskit configuration

# Report format for \`cvsskit batch\`: table, json, csv, markdown
format: table

# Exit 1 when any base score reaches this severity: none, low, medium, high, critical
fail_on: none

# Leave scored vectors below this base severity out of batch reports
severity_threshold: none
`;

export function runInit(options: InitOptions): number {
  const dir = resolve(options.path);

  if (!existsSync(dir) || !statSync(dir).isDirectory()) {
    logger.error(`Error: ${dir} is not a directory`);
    return 1;
  }

  const configFile = join(dir, CONFIG_FILE);

  process.stdout.write("\n\x1b[36mcvsskit init\x1b[0m\n\n");

  if (existsSync(configFile)) {
    process.stdout.write("\x1b[33mSkipped (already exists):\x1b[0m\n");
    process.stdout.write(`  ~ ${CONFIG_FILE}\n`);
  } else {
    writeFileSync(configFile, CONFIG_TEMPLATE);
    process.stdout.write("\x1b[32mCreated:\x1b[0m\n");
    process.stdout.write(`  + ${CONFIG_FILE}\n`);
  }

  process.stdout.write("\n");
  return 0;
}
