import { promises as fs } from "fs";
import path from "path";
import { templateConfigYaml } from "../src/config/sweepConfig.js";

function usage(): string {
  return ["usage:", "  tsx scripts/sweep_template.ts [--out <sweep.yaml>] [--force]", ""].join("\n");
}

function parseArgs(argv: string[]): Record<string, string | boolean> {
  const out: Record<string, string | boolean> = {};
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a) continue;
    if (!a.startsWith("--")) throw new Error(`unexpected arg: ${a}`);
    const key = a.slice(2);
    if (key === "force" || key === "help") {
      out[key] = true;
      continue;
    }
    const next = argv[i + 1];
    if (!next || next.startsWith("--")) throw new Error(`missing value for --${key}`);
    out[key] = next;
    i++;
  }
  return out;
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(usage());
    return;
  }

  const outPath = path.resolve(typeof args.out === "string" ? args.out : "sweep.yaml");
  await fs.mkdir(path.dirname(outPath), { recursive: true });
  // wx refuses to clobber an existing config.
  await fs.writeFile(outPath, templateConfigYaml(), { encoding: "utf8", flag: args.force ? "w" : "wx" });
  process.stdout.write(`${outPath}\n`);
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
