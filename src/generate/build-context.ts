export type BuildContextLogType = 'info' | 'warning' | 'error';

export type BuildContextLog = {
    type: BuildContextLogType;
    message: string;
};

export type BuildContextTime = {
    name: string;
    duration: number;
};

export type BuildContextState = {
    logs: BuildContextLog[];
    times: BuildContextTime[];
    _startTimes: Record<string, number>;
};

/**
 * Collects logs and step timings for grid generation passes.
 */
export const BuildContext = {
    create: (): BuildContextState => ({
        logs: [],
        times: [],
        _startTimes: {},
    }),

    start: (ctx: BuildContextState, name: string): void => {
        ctx._startTimes[name] = performance.now();
    },

    end: (ctx: BuildContextState, name: string): void => {
        const startTime = ctx._startTimes[name];
        if (startTime === undefined) return;

        ctx.times.push({ name, duration: performance.now() - startTime });
        delete ctx._startTimes[name];
    },

    log: (ctx: BuildContextState, message: string): void => {
        ctx.logs.push({ type: 'info', message });
    },

    warn: (ctx: BuildContextState, message: string): void => {
        ctx.logs.push({ type: 'warning', message });
    },

    error: (ctx: BuildContextState, message: string): void => {
        ctx.logs.push({ type: 'error', message });
    },
};
