export type LogMark =
  | 'lifecycle'
  | 'connect'
  | 'socket'
  | 'heartbeat'
  | 'watchdog'
  | 'poll'
  | 'store'
  | 'health'
  | 'restart'
  | 'timeout'
  | 'shutdown'
  | 'ok'
  | 'warn'
  | 'error';

const MARK: Record<LogMark, string> = {
  lifecycle: '🔄',
  connect: '📡',
  socket: '🔌',
  heartbeat: '💓',
  watchdog: '🐕',
  poll: '📥',
  store: '💾',
  health: '🩺',
  restart: '♻️',
  timeout: '⏳',
  shutdown: '🛑',
  ok: '✅',
  warn: '⚠️',
  error: '❌',
};

// Фича-флаг: LOG_MARKERS=on|off|auto (по умолчанию auto: включено в TTY, выключено в CI/pipe)
export function resolveMarkersEnabled(env: NodeJS.ProcessEnv = process.env, isTty = Boolean(process.stdout.isTTY)): boolean {
  const raw = (env.LOG_MARKERS ?? 'auto').toLowerCase();
  if (['0', 'off', 'false'].includes(raw)) return false;
  if (['1', 'on', 'true'].includes(raw)) return true;
  return isTty && !env.CI;
}

const ENABLED = resolveMarkersEnabled();

/**
 * Добавляет эмодзи-маркер в начало сообщения.
 * Возвращает обычную строку, не меняя формат логов.
 */
export function m(mark: LogMark, message: string): string {
  if (!ENABLED) return message;
  return `${MARK[mark]} ${message}`;
}
