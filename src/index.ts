import { config, validateConfig } from './utils/config.js';
import { createLogger } from './utils/logger.js';
import { closeCareStore, getCareStore } from './care/store.js';
import { ensureProfile } from './care/demo-profile.js';
import { fullName } from './care/profile-snapshot.js';
import { ConnectivityMonitor } from './device/connectivity.js';
import { OnDeviceAssistant } from './agent/on-device/on-device-assistant.js';
import { CloudAssistant } from './agent/cloud/cloud-assistant.js';
import { HybridAssistant } from './agent/hybrid-assistant.js';
import { ReminderScheduler } from './agent/proactive/reminder-scheduler.js';
import { checkOllamaAvailability } from './llm/ollama.js';
import { CareCommandHandler } from './interfaces/command-handler.js';
import { CLINotificationSink } from './interfaces/cli-sink.js';
import { CareCLI } from './interfaces/cli.js';

const logger = createLogger('main');

async function main(): Promise<void> {
  logger.info('Starting care companion...');

  for (const warning of validateConfig()) {
    console.log(`⚠️  ${warning}`);
  }

  const store = getCareStore();
  const profile = ensureProfile(store, { seedDemo: config.seedDemoProfile, zone: config.timezone });

  let localModelEnabled = false;
  if (config.ollama.enabled) {
    const status = await checkOllamaAvailability();
    localModelEnabled = status.available;
    if (!status.available) {
      logger.warn('Local model unavailable, using templates only', { error: status.error });
    }
  }

  const connectivity = new ConnectivityMonitor();
  connectivity.start();

  const assistant = new HybridAssistant({
    onDevice: new OnDeviceAssistant({ localModelEnabled }),
    cloud: new CloudAssistant(),
    connectivity,
  });

  let cli: CareCLI | null = null;
  const sink = new CLINotificationSink({ afterPrint: () => cli?.showPrompt() });
  const scheduler = new ReminderScheduler(sink, { timezone: config.timezone, doseLog: store });
  store.markOverdueDosesMissed(profile.id);
  scheduler.restore(store, profile.id);

  const commands = new CareCommandHandler({
    store,
    profileId: profile.id,
    assistant,
    connectivity,
    defaultMode: config.assistant.defaultMode,
    timezone: config.timezone,
    reminders: scheduler,
  });

  let shuttingDown = false;
  const shutdown = (code: number): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    scheduler.cancelAll();
    connectivity.stop();
    closeCareStore();
    process.exit(code);
  };

  process.on('SIGINT', () => {
    console.log('\n\nRecibida señal de interrupción, cerrando...');
    shutdown(0);
  });

  process.on('SIGTERM', () => {
    logger.info('Received SIGTERM, shutting down...');
    shutdown(0);
  });

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', error);
    shutdown(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', reason);
  });

  console.log(`\nHola, ${fullName(profile)}. Escribe /ayuda para ver los comandos.\n`);

  cli = new CareCLI({
    assistant,
    store,
    profileId: profile.id,
    commands,
    timezone: config.timezone,
    interactive: Boolean(process.stdout.isTTY),
    onExit: () => {
      console.log('\n¡Hasta luego!');
      shutdown(0);
    },
  });
  cli.start();
}

main().catch((error: unknown) => {
  logger.error('Fatal error', error);
  closeCareStore();
  process.exit(1);
});
