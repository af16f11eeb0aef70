import './env.js';
import cron from 'node-cron';
import { loadSettings } from './config.js';
import { resetAllOffenses } from './offenses.js';
import { Rules } from './rules.js';

const settings = loadSettings();
const rules = Rules.open(settings.DB_PATH);

function runOnce() {
  try {
    const { channels, users } = resetAllOffenses(rules);
    console.log(`Offense reset complete: channels=${channels}, users=${users}`);
  } catch (err) {
    console.error('Offense reset failed', err);
  }
}

if (settings.RUN_ONCE) {
  runOnce();
} else {
  console.log(`Scheduling offense reset with cron '${settings.RESET_CRON}' TZ '${settings.TZ}'`);
  cron.schedule(settings.RESET_CRON, runOnce, { timezone: settings.TZ });
}
