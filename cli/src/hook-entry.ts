#!/usr/bin/env node

(async () => {
  const { HookCommand } = await import('./commands/hook');
  process.exitCode = await new HookCommand().run(process.argv[2] ?? '', process.argv.slice(3));
})().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 3;
});
