import { config as loadDotenv } from "dotenv";
import cron from "node-cron";
import { AppConfig, ConfigError, loadConfig, snapshotsFilePath, toMonitorConfig } from "./config.js";
import { DiscordWebhookClient } from "./discord.js";
import { initializeFirestore } from "./firebase.js";
import { MonitorDeps, runMonitorOnce } from "./monitor.js";
import { FirestoreSnapshotStore, FirestoreStateStore, JsonSnapshotStore, JsonStateStore } from "./store.js";
import { WikiClient } from "./wiki.js";

function createDeps(appConfig: AppConfig): MonitorDeps {
  const firestore = initializeFirestore({
    serviceAccountJson: appConfig.FIREBASE_SERVICE_ACCOUNT_JSON,
    credentialsPath: appConfig.GOOGLE_APPLICATION_CREDENTIALS,
  });

  return {
    config: toMonitorConfig(appConfig),
    source: new WikiClient({
      wikiId: appConfig.WIKI_ID,
      apiKeyId: appConfig.WIKI_API_KEY_ID,
      secret: appConfig.WIKI_API_SECRET,
      baseUrl: appConfig.WIKI_API_BASE_URL,
      timeoutMs: appConfig.HTTP_TIMEOUT_MS,
    }),
    sink: new DiscordWebhookClient(appConfig.DISCORD_WEBHOOK_URL, { timeoutMs: appConfig.HTTP_TIMEOUT_MS }),
    stateStore: firestore
      ? new FirestoreStateStore(firestore, appConfig.FIRESTORE_STATE_COLLECTION)
      : new JsonStateStore(appConfig.STATE_PATH),
    snapshotStore: firestore
      ? new FirestoreSnapshotStore(firestore, appConfig.FIRESTORE_COLLECTION)
      : new JsonSnapshotStore(snapshotsFilePath(appConfig)),
  };
}

async function runCycle(deps: MonitorDeps): Promise<boolean> {
  try {
    const report = await runMonitorOnce(deps);
    console.log(
      `[BOT] Cycle completed: ${report.events.length} event(s), ${report.checkedPages.length} page(s) checked, ` +
        `${report.skippedPages.length} skipped`
    );
    return true;
  } catch (err) {
    console.error("[BOT] Cycle failed:", err instanceof Error ? err.message : err);
    return false;
  }
}

async function main(): Promise<number> {
  loadDotenv();

  let appConfig: AppConfig;
  try {
    appConfig = loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`[BOT] ${err.message}`);
      return 2;
    }
    throw err;
  }

  const deps = createDeps(appConfig);
  const schedule = appConfig.CRON_SCHEDULE;
  if (!schedule) {
    return (await runCycle(deps)) ? 0 : 1;
  }

  if (!cron.validate(schedule)) {
    console.error(`[BOT] Invalid CRON_SCHEDULE: ${schedule}`);
    return 2;
  }

  console.log(`[BOT] Wiki watcher starting. Schedule: ${schedule}`);
  await runCycle(deps);

  let running = false;
  cron.schedule(schedule, async () => {
    // Cycles share persisted state and must not overlap.
    if (running) {
      console.warn("[BOT] Previous cycle still running; skipping this tick");
      return;
    }
    running = true;
    console.log(`[BOT] Scheduled run started at ${new Date().toISOString()}`);
    try {
      await runCycle(deps);
    } finally {
      running = false;
    }
  });
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e) => {
    console.error("[BOT] Fatal:", e);
    process.exit(1);
  });
