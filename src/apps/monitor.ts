import { logger } from '../infra/logger';
import { m } from '../core/logMarkers';
import { newCorrelationId } from '../core/events/EventBus';
import { ConfigError, formatErrorDetails, toErrorMessage } from '../infra/errors';
import { loadConfig, type AppConfig } from '../infra/config';
import { checkFieldStore, createFieldStore } from '../store/createFieldStore';
import { createWorkers } from '../workers/factory';
import { Supervisor } from '../control/Supervisor';
import { createStandardFileSinks } from '../observability/logger/FileSink';
import { HealthReporter } from '../observability/health/HealthReporter';
import { installShutdownHandlers } from './shutdown';

// Точка входа долгоживущего процесса: стримы и поллеры под супервизором.
// Exit codes: 0 = штатная остановка по сигналу, 1 = ошибка конфигурации/старта или фатальная ошибка.

async function main(): Promise<number> {
    let config: AppConfig;
    try {
        config = loadConfig();
    } catch (err) {
        if (err instanceof ConfigError) {
            const details = formatErrorDetails(err);
            logger.error(m('error', `[monitor] invalid configuration: ${err.message}${details ? ` ${details}` : ''}`));
            return 1;
        }
        throw err;
    }

    const runId = newCorrelationId();
    logger.setLevel(config.logging.level);
    if (config.logging.fileSinks) {
        logger.setSinks(
            createStandardFileSinks({
                logDir: config.logging.dir,
                runId,
                maxBytes: config.logging.maxBytes,
                maxFiles: config.logging.maxFiles,
            })
        );
    }
    logger.info(
        m('lifecycle', `[monitor] starting runId=${runId} config=${config.configPath ?? 'defaults'} store=${config.store.driver}`)
    );

    const store = createFieldStore(config.store);
    await checkFieldStore(store);

    const workers = createWorkers(config, store);
    const supervisor = new Supervisor(workers, {
        healthCheckIntervalMs: config.monitoring.healthCheckIntervalMs,
        statusLogIntervalMs: config.monitoring.statusLogIntervalMs,
        startStaggerMs: config.monitoring.startStaggerMs,
        restartDelayMs: config.monitoring.restartDelayMs,
        unhealthyGraceMs: config.monitoring.unhealthyGraceMs,
        stopTimeoutMs: config.monitoring.stopTimeoutMs,
        maxRestarts: config.monitoring.maxRestarts,
        autoRestart: config.monitoring.autoRestart,
    });
    const reporter = new HealthReporter({
        runId,
        appVersion: process.env.npm_package_version,
        logDir: config.logging.dir,
        intervalMs: config.logging.healthReportIntervalMs,
        maxBytes: config.logging.maxBytes,
        maxFiles: config.logging.maxFiles,
        getReport: () => supervisor.getHealthMonitor().getLastReport(),
        getSupervisorStatus: () => supervisor.getStatus(),
        getLifecycle: () => supervisor.getLifecycle(),
    });

    const coordinator = installShutdownHandlers(process, async () => {
        try {
            const result = await supervisor.shutdown(config.monitoring.shutdownTimeoutMs);
            if (result.abandoned.length > 0) {
                logger.warn(m('warn', `[monitor] abandoned workers: ${result.abandoned.join(', ')}`));
            }
        } catch (err) {
            logger.error(m('error', `[monitor] supervisor shutdown failed: ${toErrorMessage(err)}`), err);
        }
        reporter.stop({ finalSnapshot: true });
        try {
            await store.close();
        } catch (err) {
            logger.error(m('error', `[monitor] store close failed: ${toErrorMessage(err)}`), err);
        }
        logger.info(m('ok', '[monitor] stopped'));
        await logger.flush();
        await logger.close();
    });

    reporter.start();
    supervisor.start().catch((err: unknown) => coordinator.fail('supervisor start failed', err));

    const exitCode = await coordinator.done;
    coordinator.dispose();
    return exitCode;
}

if (require.main === module) {
    main()
        .then((code) => process.exit(code))
        .catch((error: unknown) => {
            logger.error('[monitor] fatal error', error);
            process.exit(1);
        });
}
