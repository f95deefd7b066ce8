import { logger } from '../infra/logger';
import { m } from '../core/logMarkers';
import { toErrorMessage } from '../infra/errors';

export type ShutdownRunner = (reason: string) => Promise<void>;

export interface ShutdownCoordinator {
    /** Resolves with the exit code once the shutdown sequence has finished. */
    readonly done: Promise<number>;
    request(reason: string, exitCode: number): void;
    fail(label: string, err: unknown): void;
    isShuttingDown(): boolean;
    dispose(): void;
}

/**
 * SIGINT/SIGTERM -> штатная остановка (exit 0), unhandledRejection/uncaughtException -> exit 1.
 * Последовательность остановки выполняется один раз; повторные сигналы только логируются.
 */
export function installShutdownHandlers(proc: NodeJS.EventEmitter, runShutdown: ShutdownRunner): ShutdownCoordinator {
    let shuttingDown = false;
    let resolveDone: (code: number) => void = () => undefined;
    const done = new Promise<number>((resolve) => {
        resolveDone = resolve;
    });

    const request = (reason: string, exitCode: number): void => {
        if (shuttingDown) {
            logger.warn(m('shutdown', `[monitor] ${reason} ignored: shutdown already in progress`));
            return;
        }
        shuttingDown = true;
        logger.info(m('shutdown', `[monitor] ${reason} received, shutting down...`));
        void runShutdown(reason).then(
            () => resolveDone(exitCode),
            (err: unknown) => {
                logger.error(m('error', `[monitor] shutdown failed: ${toErrorMessage(err)}`), err);
                resolveDone(1);
            }
        );
    };

    const fail = (label: string, err: unknown): void => {
        logger.error(m('error', `[monitor] ${label}: ${toErrorMessage(err)}`), err);
        request(label, 1);
    };

    const onSigint = () => request('SIGINT', 0);
    const onSigterm = () => request('SIGTERM', 0);
    const onRejection = (reason: unknown) => fail('unhandledRejection', reason);
    const onException = (err: unknown) => fail('uncaughtException', err);

    proc.on('SIGINT', onSigint);
    proc.on('SIGTERM', onSigterm);
    proc.on('unhandledRejection', onRejection);
    proc.on('uncaughtException', onException);

    return {
        done,
        request,
        fail,
        isShuttingDown: () => shuttingDown,
        dispose: () => {
            proc.off('SIGINT', onSigint);
            proc.off('SIGTERM', onSigterm);
            proc.off('unhandledRejection', onRejection);
            proc.off('uncaughtException', onException);
        },
    };
}
