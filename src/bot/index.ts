/* ===============================
   IMPORTS & ENV
   =============================== */

import * as fs from 'node:fs';
import * as dotenv from 'dotenv';
import { Bot, InputFile } from 'grammy';

import { loadScreenerConfig, type ScreenerConfig } from '../config/screenerConfig.js';
import { ConfigError } from '../core/errors.js';
import { createScreenerSettings } from '../core/settings.js';
import { MarketWatcher } from '../market/watcher.js';
import { getEventLogPath, logEvent, setEventLogPath } from '../market/logger.js';
import { createMarketDataClient } from '../services/marketData.js';
import { TelegramAlertDispatcher, markdownSender } from '../services/telegram.js';
import {
  applySettingInput,
  formatSettings,
  isSettingKey,
  NOT_A_NUMBER,
  SETTING_PROMPTS,
  type SettingKey,
} from './settingsEditor.js';
import { commandKeyboard, mainMenu, MENU_ACTIONS, settingsMenu, welcomeMsg } from './menus.js';
import { formatAddResult, formatRemoveResult, formatStatus, formatWatchlist } from './replies.js';
import { Subscriptions } from './subscriptions.js';

dotenv.config();

function loadConfigOrExit(): ScreenerConfig {
  try {
    return loadScreenerConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error('❌ Missing or invalid env vars:', err.problems.join(', '));
      process.exit(1);
    }
    throw err;
  }
}

const config = loadConfigOrExit();
setEventLogPath(config.logPath);

/* ===============================
   STATE
   =============================== */

const subscribers = new Subscriptions(config.adminChatId);
// chat -> какую настройку ждём текстом
const awaitingInput = new Map<number, SettingKey>();

const settings = createScreenerSettings(config);

/* ===============================
   BOT & WATCHER INIT
   =============================== */

const bot = new Bot(config.botToken);

const watcher = new MarketWatcher({
  client: createMarketDataClient(config),
  dispatcher: new TelegramAlertDispatcher(markdownSender(bot.api), () => subscribers.recipients()),
  settings,
  intervalMs: config.checkIntervalMs,
  symbolDelayMs: config.symbolDelayMs,
  onEvent: logEvent,
});

function statusText() {
  return formatStatus({
    exchange: config.exchange,
    subscribers: subscribers.size,
    watched: settings.watchlist.size,
    intervalMs: config.checkIntervalMs,
    running: watcher.isRunning(),
    lastReport: watcher.getLastReport(),
  });
}

/* ===============================
   GLOBAL GUARDS & SHUTDOWN
   =============================== */

let isShuttingDown = false;

async function shutdown(signal: string) {
  if (isShuttingDown) return;
  isShuttingDown = true;

  console.log(`🛑 Shutdown (${signal})`);

  try {
    await watcher.stop();
  } catch (err) {
    console.error('Watcher shutdown error:', err);
  }

  try {
    await bot.stop();
  } catch (err) {
    console.error('Bot shutdown error:', err);
  }

  process.exit(0);
}

process.on('SIGINT', () => {
  shutdown('SIGINT').catch(console.error);
});
process.on('SIGTERM', () => {
  shutdown('SIGTERM').catch(console.error);
});

process.on('uncaughtException', err => {
  console.error('UNCAUGHT EXCEPTION:', err);
});

process.on('unhandledRejection', reason => {
  console.error('UNHANDLED REJECTION:', reason);
});

/* ===============================
   COMMANDS
   =============================== */

bot.command('start', async ctx => {
  subscribers.subscribe(ctx.chat.id);
  watcher.start();
  console.log(`➕ Subscribed chat ${ctx.chat.id}`);
  await ctx.reply(welcomeMsg, { parse_mode: 'Markdown', reply_markup: commandKeyboard });
  await ctx.reply('Menu:', { reply_markup: mainMenu });
});

bot.command('add', async ctx => {
  const args = ctx.match.split(/[\s,]+/).filter(Boolean);
  if (!args.length) {
    await ctx.reply('Usage: /add BTC ETH SOL');
    return;
  }

  const result = settings.watchlist.addMany(args);
  if (result.added.length) {
    console.log(`➕ Watchlist: ${result.added.join(', ')}`);
  }
  await ctx.reply(formatAddResult(result));
});

bot.command('remove', async ctx => {
  const symbol = ctx.match.trim();
  if (!symbol) {
    await ctx.reply('Usage: /remove BTC');
    return;
  }
  const removed = settings.watchlist.remove(symbol);
  await ctx.reply(formatRemoveResult(symbol, removed));
});

bot.command('list', async ctx => {
  await ctx.reply(formatWatchlist(settings.watchlist));
});

bot.command('status', async ctx => {
  await ctx.reply(statusText());
});

bot.command('stop', async ctx => {
  subscribers.unsubscribe(ctx.chat.id);
  awaitingInput.delete(ctx.chat.id);
  console.log(`➖ Unsubscribed chat ${ctx.chat.id}`);

  // останавливать сканер может только админ, и только если больше никто не подписан
  if (subscribers.shouldStopWatcher(ctx.chat.id)) {
    await watcher.stop();
    console.log(`🛑 WATCHER STOPPED by chat ${ctx.chat.id}`);
    await ctx.reply('🛑 Screener stopped. /start to resume.', { reply_markup: commandKeyboard });
    return;
  }

  await ctx.reply('🔕 Unsubscribed from alerts', { reply_markup: commandKeyboard });
});

bot.command('download_logs', async ctx => {
  try {
    await ctx.replyWithDocument(new InputFile(fs.createReadStream(getEventLogPath()), 'screener.log'));
  } catch (error) {
    console.error('Error sending log file:', error);
    await ctx.reply('❌ Error sending log file');
  }
});

/* ===============================
   INLINE MENUS
   =============================== */

bot.on('callback_query:data', async ctx => {
  const action = ctx.callbackQuery.data;
  await ctx.answerCallbackQuery();

  if (isSettingKey(action)) {
    if (ctx.chat) awaitingInput.set(ctx.chat.id, action);
    await ctx.editMessageText(`✏️ Enter ${SETTING_PROMPTS[action]}:`);
    return;
  }

  switch (action) {
    case MENU_ACTIONS.SETTINGS:
      await ctx.editMessageText(
        '🤖 Scanning for small pumps 🟢, large pumps 🟡 and sharp dumps 🔴.\n\n' +
          formatSettings(settings),
        { reply_markup: settingsMenu }
      );
      break;
    case MENU_ACTIONS.SHOW_SETTINGS:
      await ctx.editMessageText(formatSettings(settings), { reply_markup: settingsMenu });
      break;
    case MENU_ACTIONS.EXCHANGES:
      await ctx.editMessageText(`📊 Exchange: ${config.exchange}`, { reply_markup: mainMenu });
      break;
    case MENU_ACTIONS.STATUS:
      await ctx.editMessageText(statusText(), { reply_markup: mainMenu });
      break;
    case MENU_ACTIONS.BACK:
      await ctx.editMessageText(welcomeMsg, { parse_mode: 'Markdown', reply_markup: mainMenu });
      break;
    default:
      console.warn('Unknown callback:', action);
  }
});

/* ===============================
   TEXT INPUT & START
   =============================== */

bot.on('message:text', async ctx => {
  const key = awaitingInput.get(ctx.chat.id);
  if (!key) {
    await ctx.reply('👇 Use buttons below', { reply_markup: commandKeyboard });
    return;
  }

  const result = applySettingInput(settings, key, ctx.message.text);
  if (!result.ok) {
    await ctx.reply(
      result.reason === NOT_A_NUMBER ? '❌ Enter a number (e.g. 3.5)' : `❌ ${result.reason}`
    );
    return;
  }

  awaitingInput.delete(ctx.chat.id);
  console.log(`⚙️ ${result.key} = ${result.value} (chat ${ctx.chat.id})`);
  await ctx.reply(`✅ Setting updated: ${SETTING_PROMPTS[result.key]} = ${result.value}`, {
    reply_markup: settingsMenu,
  });
});

bot.catch(err => console.error('Bot error:', err));

console.log('🚀 Starting bot...');
bot
  .start({
    onStart: info => {
      console.log(`🤖 Bot @${info.username} is running!`);
      watcher.start();
    },
  })
  .catch(err => {
    console.error('Bot polling stopped:', err);
    process.exit(1);
  });
