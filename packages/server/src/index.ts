import { loadConfig } from './config';
import { createScriptMenuServer } from './app';
import { createScripting } from './scripting';
import { UiHost } from './host/uiHost';
import { createMachineHandle } from './host/machine';
import { createDefaultRegistry } from './scripts/interpreters';
import { ensureScriptsDirectory } from './scripts/bootstrap';

async function main() {
  const config = loadConfig();
  await ensureScriptsDirectory(config.scriptsDir);

  const uiHost = new UiHost();
  const registry = createDefaultRegistry();
  const scripting = createScripting({
    rootDir: config.scriptsDir,
    registry,
    bindings: { config, machine: createMachineHandle(), gui: uiHost },
    debounceMs: config.debounceMs,
  });
  uiHost.onRefresh(() => scripting.refresh());

  console.log(`[scripts] Interpreters: ${registry.list().map((i) => i.name).join(', ')}`);
  console.log(`[scripts] Extensions: ${[...scripting.supportedExtensions].join(', ')}`);

  await scripting.start();

  const { server, close } = createScriptMenuServer({ config, scripting, uiHost });

  // Graceful shutdown
  process.on('SIGINT', () => {
    console.log('\n[server] shutting down...');
    Promise.all([scripting.close(), close()])
      .catch((err: unknown) => {
        console.error('[server] Error during shutdown:', err instanceof Error ? err.message : err);
      })
      .finally(() => process.exit(0));
  });

  server.listen(config.port, config.host, () => {
    console.log(`[server] listening on http://${config.host}:${config.port}`);
    console.log(`[server] WebSocket on ws://${config.host}:${config.port}/ws`);
  });
}

main().catch((err: unknown) => {
  console.error('[server] Failed to start:', err instanceof Error ? err.message : err);
  process.exit(1);
});
