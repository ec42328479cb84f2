import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { cleanAndParseJson, formatJson } from "../src/lib/json/clean-json";

function main() {
  const target = process.argv[2];
  if (!target) {
    console.error("Usage: npm run clean:json -- <path/to/file.json>");
    process.exit(1);
  }

  if (!existsSync(target)) {
    console.error(`File not found: ${target}`);
    process.exit(2);
  }

  const text = readFileSync(target, "utf-8");
  const result = cleanAndParseJson(text);

  if (!result.ok) {
    const cleanedPath = `${target}.cleaned`;
    writeFileSync(cleanedPath, result.cleaned, "utf-8");
    console.error("Clean-up completed but JSON parsing still fails", {
      error: result.error,
      cleanedPath,
    });
    process.exit(3);
  }

  const backupPath = `${target}.bak`;
  writeFileSync(backupPath, text, "utf-8");
  console.log(`Backup saved to ${backupPath}`);

  writeFileSync(target, formatJson(result.value), "utf-8");
  console.log(`Wrote cleaned JSON to ${target}`);
}

main();
