import readline from 'node:readline';
import type { AppConfig } from '../infra/config';
import { toErrorMessage } from '../infra/errors';
import { buildFieldKey, FIELD, parseInstrumentRecord, type FieldMap, type FieldStore } from '../store/FieldStore';

// Диагностика стора: чтение записей и проверка свежести по источникам.
// Только чтение: ничего не пишет и не трогает воркеры.

export const SPOT_FRESHNESS_MS = 60_000;
export const FUTURES_FRESHNESS_MS = 300_000;

export interface FreshnessTarget {
  source: string;
  thresholdMs: number;
  timestampField: string;
}

export interface InspectContext {
  store: FieldStore;
  targets: FreshnessTarget[];
  now?: () => number;
}

export interface InspectResult {
  lines: string[];
  exitCode: number;
}

export const INSPECT_USAGE = [
  'Commands:',
  '  get <SOURCE:COIN>   print one record',
  '  keys [prefix]       list keys',
  '  lookup <COIN>       print the record of every source for a coin',
  '  freshness           data age per source against its threshold',
];

export function freshnessTargets(config: AppConfig): FreshnessTarget[] {
  const targets: FreshnessTarget[] = [];
  for (const stream of config.streams) {
    if (!stream.enabled) continue;
    targets.push({ source: stream.source, thresholdMs: SPOT_FRESHNESS_MS, timestampField: FIELD.priceTimestamp });
  }
  for (const service of config.funding) {
    if (!service.enabled) continue;
    targets.push({ source: service.source, thresholdMs: FUTURES_FRESHNESS_MS, timestampField: FIELD.fundingTimestamp });
  }
  return targets;
}

export function formatRecord(key: string, fields: FieldMap): string[] {
  const lines = [key];
  for (const name of Object.keys(fields).sort()) {
    lines.push(`  ${name} = ${fields[name]}`);
  }
  return lines;
}

const formatAge = (ms: number): string => `${Math.round(ms / 1000)}s`;

export async function runInspectCommand(args: readonly string[], ctx: InspectContext): Promise<InspectResult> {
  const [cmd, arg] = args;
  const now = ctx.now ?? (() => Date.now());

  switch (cmd) {
    case 'get': {
      if (!arg) return { lines: ['usage: get <SOURCE:COIN>'], exitCode: 2 };
      const fields = await ctx.store.read(arg);
      if (!fields) return { lines: [`${arg}: not found`], exitCode: 1 };
      return { lines: formatRecord(arg, fields), exitCode: 0 };
    }

    case 'keys': {
      const keys = Array.from(await ctx.store.listKeys(arg ?? '')).sort();
      return { lines: keys.length ? keys : ['(no keys)'], exitCode: 0 };
    }

    case 'lookup': {
      if (!arg) return { lines: ['usage: lookup <COIN>'], exitCode: 2 };
      const coin = arg.trim().toUpperCase();
      const lines: string[] = [];
      let found = 0;
      for (const target of ctx.targets) {
        const key = buildFieldKey(target.source, coin);
        const fields = await ctx.store.read(key);
        if (!fields) {
          lines.push(`${key}: not found`);
          continue;
        }
        found += 1;
        lines.push(...formatRecord(key, fields));
      }
      return { lines, exitCode: found > 0 ? 0 : 1 };
    }

    case 'freshness':
      return checkFreshness(ctx, now());

    case undefined:
    case 'help':
      return { lines: INSPECT_USAGE, exitCode: 0 };

    default:
      return { lines: [`unknown command: ${cmd}`, ...INSPECT_USAGE], exitCode: 2 };
  }
}

async function checkFreshness(ctx: InspectContext, now: number): Promise<InspectResult> {
  const lines: string[] = [];
  let allOk = true;

  for (const target of ctx.targets) {
    const keys = Array.from(await ctx.store.listKeys(`${target.source}:`)).sort();
    const ages: number[] = [];
    for (const key of keys) {
      const fields = await ctx.store.read(key);
      const record = fields ? parseInstrumentRecord(key, fields) : undefined;
      const stamp = fields?.[target.timestampField];
      if (!record || !stamp) continue;
      const parsed = Date.parse(stamp);
      if (Number.isFinite(parsed)) ages.push(now - parsed);
    }

    if (ages.length === 0) {
      allOk = false;
      lines.push(`${target.source}: EMPTY (0 records with ${target.timestampField})`);
      continue;
    }

    const fresh = ages.filter((age) => age < target.thresholdMs).length;
    const status = fresh === ages.length ? 'OK' : 'STALE';
    if (status !== 'OK') allOk = false;
    lines.push(
      `${target.source}: ${status} fresh ${fresh}/${ages.length}, newest ${formatAge(Math.min(...ages))}, oldest ${formatAge(Math.max(...ages))} (threshold ${formatAge(target.thresholdMs)})`
    );
  }

  return { lines, exitCode: allOk ? 0 : 1 };
}

/** Interactive mode: one command per line until `exit` or end of input. */
export function startInspectRepl(
  ctx: InspectContext,
  io: { input: NodeJS.ReadableStream; output: NodeJS.WritableStream } = { input: process.stdin, output: process.stdout }
): Promise<void> {
  const rl = readline.createInterface({ input: io.input, output: io.output, prompt: 'inspect> ' });
  const write = (line: string) => io.output.write(`${line}\n`);

  write(INSPECT_USAGE.join('\n'));
  rl.prompt();

  // команды выполняются строго по очереди, даже если строки приходят пачкой
  let queue: Promise<void> = Promise.resolve();
  let closed = false;
  const prompt = () => {
    if (!closed) rl.prompt();
  };

  rl.on('line', (line) => {
    const args = line.trim().split(/\s+/).filter(Boolean);
    if (args[0] === 'exit' || args[0] === 'quit') {
      rl.close();
      return;
    }
    queue = queue.then(async () => {
      if (args.length === 0) {
        prompt();
        return;
      }
      try {
        const result = await runInspectCommand(args, ctx);
        result.lines.forEach(write);
      } catch (err) {
        write(`error: ${toErrorMessage(err)}`);
      }
      prompt();
    });
  });

  return new Promise<void>((resolve) => {
    rl.on('close', () => {
      closed = true;
      void queue.then(resolve);
    });
  });
}
