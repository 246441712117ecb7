import { createCli, describeError } from "./program.js";

async function main() {
  await createCli().parseAsync(process.argv);
}

main().catch((err) => {
  console.error(describeError(err));
  process.exitCode = 1;
});
