import fs from 'fs';
import path from 'path';
import { REQUEST_LOGS_DIR } from '../config';

function tsString(d = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  const y = d.getFullYear();
  const m = pad(d.getMonth() + 1);
  const day = pad(d.getDate());
  const hh = pad(d.getHours());
  const mm = pad(d.getMinutes());
  const ss = pad(d.getSeconds());
  const ms = String(d.getMilliseconds()).padStart(3, '0');
  return `${y}-${m}-${day}_${hh}-${mm}-${ss}.${ms}`;
}

export function writeRequestLog(nameHint: string, payload: unknown, dir: string = REQUEST_LOGS_DIR) {
  try {
    fs.mkdirSync(dir, { recursive: true });
    const ts = tsString();
    const safeHint = nameHint.replace(/[^a-zA-Z0-9._-]+/g, '_').slice(0, 80);
    const file = path.join(dir, `${ts}_${safeHint}.log`);
    const meta = { name: nameHint, timestamp: ts };
    fs.writeFileSync(file, JSON.stringify({ meta, payload }, null, 2));
  } catch (e) {
    // eslint-disable-next-line no-console
    console.warn('request log write failed', e);
  }
}
