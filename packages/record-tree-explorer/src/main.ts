#!/usr/bin/env tsx
import { createInterface, isFatalConfigError } from './cli/program';

async function main(): Promise<void> {
  const program = createInterface();
  await program.parseAsync(process.argv);
}

main().catch((err: unknown) => {
  if (isFatalConfigError(err)) {
    console.error(err.message);
  } else {
    console.error(err instanceof Error ? (err.stack ?? err.message) : String(err));
  }
  process.exitCode = 1;
});
