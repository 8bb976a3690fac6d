import fs from "fs/promises";
import { parseCliArgs, USAGE, UsageError, type ParsedArgs } from "./args";
import { EXIT_INVALID, runCli } from "./cli";
import { loadDefaults, saveDefaults } from "./config/store";

const run = async () => {
  const defaults = await loadDefaults();
  let parsed: ParsedArgs;
  try {
    parsed = parseCliArgs(process.argv.slice(2), process.env, defaults);
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`[can-timing] error: ${error.message}`);
      console.error(USAGE);
      return EXIT_INVALID;
    }
    throw error;
  }

  if (parsed.help) {
    console.log(USAGE);
    return 0;
  }

  return runCli(parsed.options, {
    stdout: (text) => console.log(text),
    stderr: (text) => console.error(text),
    writeFile: (filePath, content) => fs.writeFile(filePath, content, "utf8"),
    saveDefaults: (next) => saveDefaults({ ...defaults, ...next }),
    now: () => new Date(),
  });
};

run()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error(`[can-timing] fatal: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  });
