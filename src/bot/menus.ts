import { InlineKeyboard, Keyboard } from 'grammy';

export const MENU_ACTIONS = {
  EXCHANGES: 'exchanges',
  SETTINGS: 'settings',
  STATUS: 'status',
  SHOW_SETTINGS: 'show_settings',
  BACK: 'back_to_menu',
} as const;

export const mainMenu = new InlineKeyboard()
  .text('📊 Exchange', MENU_ACTIONS.EXCHANGES)
  .text('⚙️ Settings', MENU_ACTIONS.SETTINGS)
  .row()
  .text('📡 Status', MENU_ACTIONS.STATUS);

export const settingsMenu = new InlineKeyboard()
  .text('🟢 Pump period', 'set_pump_period')
  .text('➕ Pump %', 'set_pump_percent')
  .row()
  .text('🟡 Short period', 'set_short_period')
  .text('➕ Short %', 'set_short_percent')
  .row()
  .text('🔴 Dump period', 'set_dump_period')
  .text('➕ Dump %', 'set_dump_percent')
  .row()
  .text('📊 Min volume', 'set_min_volume')
  .row()
  .text('👀 Show settings', MENU_ACTIONS.SHOW_SETTINGS)
  .row()
  .text('🔚 Back', MENU_ACTIONS.BACK);

export const commandKeyboard = new Keyboard()
  .text('/start')
  .text('/list')
  .row()
  .text('/status')
  .text('/stop')
  .text('/download_logs')
  .resized();

export const welcomeMsg =
  `🚀 *Pump Screener*\n\n` +
  `🟢 small pumps, 🟡 large pumps and 🔴 sharp dumps\n` +
  `➕ /add BTC ETH — watch more coins\n` +
  `➖ /remove BTC — stop watching a coin`;
