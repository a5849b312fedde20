import { existsSync } from "fs";
import { copyFile, readFile, writeFile } from "fs/promises";
import { join, resolve } from "path";
import { CONFIG_FILENAMES } from "../config/loader.js";
import { log } from "../utils/logger.js";
import { getPackageRoot } from "../utils/paths.js";

const GITIGNORE_LINE = "reports/";
const GITIGNORE_ENTRY = `
# autobdd
${GITIGNORE_LINE}
`;

export async function initCommand(): Promise<void> {
  const cwd = process.cwd();

  log.heading("Initializing autobdd...");

  const configPath = resolve(cwd, CONFIG_FILENAMES[0]);
  if (existsSync(configPath)) {
    log.warn(`${CONFIG_FILENAMES[0]} already exists, skipping`);
  } else {
    await copyFile(join(getPackageRoot(), "config", "config.yaml"), configPath);
    log.success(`Created ${CONFIG_FILENAMES[0]}`);
  }

  const gitignorePath = resolve(cwd, ".gitignore");
  if (existsSync(gitignorePath)) {
    const gitignore = await readFile(gitignorePath, "utf-8");
    if (!gitignore.split(/\r?\n/).some((line) => line.trim() === GITIGNORE_LINE)) {
      await writeFile(gitignorePath, gitignore + GITIGNORE_ENTRY);
      log.success(`Added ${GITIGNORE_LINE} to .gitignore`);
    }
  } else {
    await writeFile(gitignorePath, GITIGNORE_ENTRY.trimStart());
    log.success(`Created .gitignore with ${GITIGNORE_LINE}`);
  }

  log.heading("Done! Next steps:");
  log.info(`1. Edit ${CONFIG_FILENAMES[0]} with your AI provider and browser settings`);
  log.info("2. Run `autobdd validate` to check the configuration");
  log.info("3. Run `autobdd quick <url>` to check that scraping and analysis work");
  log.info("4. Run `autobdd run <url>` for the full pipeline");
}
