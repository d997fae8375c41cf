import cron from "node-cron";
import { AppConfig, loadConfig } from "./config";
import { errorMessage } from "./errors";
import { LeagueClient } from "./leagueClient";
import { logger } from "./logger";
import { ScheduleMonitor } from "./monitor";
import { StorageService } from "./storageService";
import { ChangeNotifier, TelegramService } from "./telegramService";

function createNotifier(config: AppConfig): ChangeNotifier | undefined {
  if (!config.telegram) {
    logger.warn("Telegram is not configured, changes will only be logged");
    return undefined;
  }

  return new TelegramService(config.telegram.botToken, config.telegram.chatId, {
    dryRun: config.testMode,
  });
}

function createMonitor(config: AppConfig): ScheduleMonitor {
  const storage = new StorageService(config.storagePath, config.exportPath);

  return new ScheduleMonitor(
    {
      source: new LeagueClient({
        baseUrl: config.baseUrl,
        timeoutMs: config.requestTimeoutMs,
        userAgent: config.userAgent,
      }),
      store: storage,
      exporter: storage,
      notifier: createNotifier(config),
    },
    {
      venueFilter: config.venueFilter,
      monitorDays: config.monitorDays,
      timezone: config.timezone,
      duplicatePolicy: config.duplicatePolicy,
      notifyOnFirstRun: config.notifyOnFirstRun,
    }
  );
}

async function runCycle(monitor: ScheduleMonitor, config: AppConfig): Promise<boolean> {
  logger.info("Starting fetch → normalize → diff → notify cycle");

  try {
    const outcome = await monitor.runCycle();
    if (outcome) {
      logger.info(
        `Cycle complete: ${outcome.report.summary()}${outcome.notified ? ", notification sent" : ""}`
      );
    }
    return true;
  } catch (error) {
    logger.error(
      `Failed to complete cycle for ${config.venueFilter}: ${errorMessage(error)}`,
      error
    );
    return false;
  }
}

function bootstrap(): void {
  const config = loadConfig();
  const monitor = createMonitor(config);

  if (config.runOnce || process.argv.includes("--once")) {
    void runCycle(monitor, config).then((ok) => {
      process.exitCode = ok ? 0 : 1;
    });
    return;
  }

  const schedule = cron.schedule(
    config.cronPattern,
    () => void runCycle(monitor, config),
    {
      timezone: config.timezone,
    }
  );

  logger.info(`Scheduler ready with pattern "${config.cronPattern}" (${config.timezone})`);
  logger.info(`Watching ${config.venueFilter}, snapshot at ${config.storagePath}`);

  void runCycle(monitor, config);

  const shutdown = (signal: string): void => {
    logger.info(`Received ${signal}. Shutting down scheduler...`);
    schedule.stop();
    process.exit(0);
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

bootstrap();
