import { copyFile, mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { PROJECT_ROOT } from "./config.js";
import { cloneDefaultState } from "./storage/db.js";

const STATE_PATH = process.env.STATE_PATH?.trim() || join(PROJECT_ROOT, "data", "state.json");

async function main(): Promise<void> {
  const dataDir = dirname(STATE_PATH);
  await mkdir(dataDir, { recursive: true });

  let hadExistingState = false;
  try {
    await readFile(STATE_PATH, "utf8");
    hadExistingState = true;
  } catch {
    hadExistingState = false;
  }

  if (hadExistingState) {
    const backupPath = join(dataDir, `state.backup.${Date.now()}.json`);
    await copyFile(STATE_PATH, backupPath);
    console.log(`Backed up existing state to: ${backupPath}`);
  }

  await writeFile(STATE_PATH, JSON.stringify(cloneDefaultState(), null, 2), "utf8");
  console.log(`Reset state file: ${STATE_PATH}`);
}

main().catch((error: unknown) => {
  console.error("[reset-state] Failed:", error);
  process.exitCode = 1;
});
