import { logger } from '../infra/logger';
import { ConfigError, formatErrorDetails, toErrorMessage } from '../infra/errors';
import { loadConfig } from '../infra/config';
import { createFieldStore } from '../store/createFieldStore';
import { freshnessTargets, runInspectCommand, startInspectRepl, type InspectContext } from '../cli/inspect';

// feed-inspect [--config path] <command> [arg]
// Без команды запускается интерактивный режим.

function stripConfigArgs(argv: readonly string[]): string[] {
    const rest: string[] = [];
    for (let i = 0; i < argv.length; i += 1) {
        const arg = argv[i];
        if (arg === '--config') {
            i += 1;
            continue;
        }
        if (arg.startsWith('--config=')) continue;
        rest.push(arg);
    }
    return rest;
}

async function main(): Promise<number> {
    const argv = process.argv.slice(2);
    const config = loadConfig({ argv });
    // вывод команды идёт в stdout; логи только про ошибки
    logger.setLevel('error');

    const store = createFieldStore(config.store);
    const ctx: InspectContext = { store, targets: freshnessTargets(config) };
    const args = stripConfigArgs(argv);

    try {
        if (args.length === 0) {
            await startInspectRepl(ctx);
            return 0;
        }
        const result = await runInspectCommand(args, ctx);
        for (const line of result.lines) process.stdout.write(`${line}\n`);
        return result.exitCode;
    } finally {
        await store.close();
    }
}

if (require.main === module) {
    main()
        .then((code) => process.exit(code))
        .catch((error: unknown) => {
            const details = error instanceof ConfigError ? formatErrorDetails(error) : undefined;
            logger.error(`[inspect] ${toErrorMessage(error)}${details ? ` ${details}` : ''}`);
            process.exit(1);
        });
}
