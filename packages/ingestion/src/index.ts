import { loadConfig } from "./config";
import type { ChatBot } from "./bot/chatBot";
import { loadCursor, saveCursor } from "./db/cursorStore";
import { runMigrations } from "./db/migrations";
import { createPool } from "./db/pool";
import { createProgressLogger } from "./ingestion/progressLogger";
import { createLiveChat } from "./liveChat";
import type { LiveChatConfig } from "./types";

async function restoreCursor(config: LiveChatConfig): Promise<string | null> {
  const pool = createPool(config.databaseUrl);

  try {
    const applied = await runMigrations(pool);
    const cursor = await loadCursor(pool, config.liveChatId);

    console.log(
      `live chat ingestion starting (liveChatId=${config.liveChatId}, transport=${config.transport}, migrationsApplied=${applied.length}, cursor=${cursor ?? "null"})`
    );

    return cursor;
  } finally {
    await pool.end();
  }
}

async function exportCursor(config: LiveChatConfig, cursor: string | null): Promise<void> {
  const pool = createPool(config.databaseUrl);

  try {
    await saveCursor(pool, config.liveChatId, cursor);
    console.log(`cursor exported (liveChatId=${config.liveChatId}, cursor=${cursor ?? "null"})`);
  } finally {
    await pool.end();
  }
}

function logChatEvents(bot: ChatBot, log: (message: string) => void): void {
  bot.on("message", (event) => {
    log(`chat message (id=${event.id}, author=${event.author.displayName}, text=${event.message})`);
  });
  bot.on("superChat", (event) => {
    log(`super chat (id=${event.id}, author=${event.author.displayName}, amount=${event.amountDisplay}, comment=${event.comment})`);
  });
  bot.on("superSticker", (event) => {
    log(`super sticker (id=${event.id}, author=${event.author.displayName}, amount=${event.amountDisplay}, sticker=${event.altText})`);
  });
  bot.on("membership", (event) => {
    log(`new member (id=${event.id}, author=${event.author.displayName}, level=${event.levelName}, upgrade=${event.isUpgrade})`);
  });
  bot.on("memberMilestone", (event) => {
    log(`member milestone (id=${event.id}, author=${event.author.displayName}, months=${event.months})`);
  });
  bot.on("giftMembership", (event) => {
    log(`memberships gifted (id=${event.id}, author=${event.author.displayName}, count=${event.count})`);
  });
  bot.on("giftMembershipReceived", (event) => {
    log(`gift membership received (id=${event.id}, author=${event.author.displayName}, gifter=${event.gifterChannelId})`);
  });
  bot.on("messageDeleted", (messageId) => {
    log(`message deleted (id=${messageId})`);
  });
  bot.on("userBanned", (event) => {
    log(`user banned (channelId=${event.bannedUser?.channelId ?? "unknown"}, type=${event.banType}, durationMs=${event.durationMs})`);
  });
  bot.on("poll", (event) => {
    log(`poll (id=${event.pollId}, status=${event.status}, question=${event.question})`);
  });
}

async function main(): Promise<void> {
  const config = loadConfig();
  if (!config.liveChatId) {
    throw new Error("LIVE_CHAT_ID is required");
  }

  const cursor = await restoreCursor(config);
  const { bot, loop, quotaLedger } = createLiveChat(config, { initialCursor: cursor });
  const progressLogger = createProgressLogger({
    intervalMs: config.progressLogIntervalMs,
    transport: config.transport
  });
  const debug = config.logLevel === "debug";

  quotaLedger.onUsageChange((used, limit) => progressLogger.onQuota(used, limit));
  loop.on("pollComplete", (completion) => {
    progressLogger.onBatch(completion.count, loop.cursor());
    if (debug) {
      console.log(
        `poll complete (items=${completion.count}, nextIntervalMs=${completion.nextIntervalMs}, cursor=${loop.cursor() ?? "null"})`
      );
    }
  });
  loop.on("response", (page) => {
    progressLogger.onBatch(page.items.length, loop.cursor());
    if (debug) {
      console.log(`stream frame (items=${page.items.length}, cursor=${loop.cursor() ?? "null"})`);
    }
  });

  logChatEvents(bot, console.log);
  bot.onError((error) => {
    progressLogger.onError();
    console.error(`live chat error (name=${error.name}, message=${error.message})`);
  });
  bot.on("connect", () => console.log(`live chat connected (liveChatId=${loop.liveChatId()})`));

  const disconnected = new Promise<void>((resolve) => {
    bot.on("disconnect", () => resolve());
  });

  const shutdown = new AbortController();
  const requestShutdown = (signalName: string): void => {
    console.log(`shutdown requested (signal=${signalName})`);
    shutdown.abort();
  };
  process.once("SIGINT", () => requestShutdown("SIGINT"));
  process.once("SIGTERM", () => requestShutdown("SIGTERM"));

  await bot.connect(shutdown.signal);
  await disconnected;
  await bot.close();

  progressLogger.flush();
  await exportCursor(config, loop.cursor());
  console.log("live chat ingestion stopped");
}

main().catch((error: unknown) => {
  console.error("live chat ingestion failed", error);
  process.exit(1);
});
