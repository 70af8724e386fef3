import {
    ConfigurationError,
    ConsoleLogger,
    DecisionEngine,
    SqliteDecisionStore,
    loadConfig,
    registryFromConfig,
} from "@fleetroute/core";
import type { FleetRouteConfig, Logger, NodeRegistry, StrategyName } from "@fleetroute/core";

export interface RuntimeOptions {
    config?: string;
    strategy?: string;
    model?: string;
    /** commander sets this to false for --no-history */
    history?: boolean;
    verbose?: boolean;
}

export interface Runtime {
    config: FleetRouteConfig;
    logger: Logger;
    registry: NodeRegistry;
    engine: DecisionEngine;
    store: SqliteDecisionStore | null;
    close(): void;
}

const STRATEGIES: readonly StrategyName[] = ["heuristic", "classifier", "blended"];

function isStrategy(value: string): value is StrategyName {
    return STRATEGIES.some((s) => s === value);
}

/** Config file plus command-line overrides. */
export function resolveConfig(options: RuntimeOptions): FleetRouteConfig {
    const config = loadConfig(options.config);
    const strategy = options.strategy ?? config.engine.strategy;
    if (!isStrategy(strategy)) {
        throw new ConfigurationError(`Unknown strategy '${strategy}' (expected one of ${STRATEGIES.join(", ")})`);
    }
    return {
        ...config,
        engine: {
            ...config.engine,
            strategy,
            classifierPath: options.model ?? config.engine.classifierPath,
        },
        logging: {
            ...config.logging,
            level: options.verbose ? "DEBUG" : config.logging.level,
        },
    };
}

export function createRuntime(options: RuntimeOptions): Runtime {
    const config = resolveConfig(options);
    const logger = new ConsoleLogger({ level: config.logging.level, file: config.logging.file });
    const registry = registryFromConfig(config, logger);
    const store =
        config.history.enabled && options.history !== false ? new SqliteDecisionStore(config.history.dbPath) : null;
    const engine = new DecisionEngine({
        registry,
        config,
        logger,
        ...(store ? { sink: store } : {}),
    });

    return {
        config,
        logger,
        registry,
        engine,
        store,
        close: () => store?.close(),
    };
}

/** Open the decision store named in config, for read-only commands. */
export function openStore(options: Pick<RuntimeOptions, "config">): SqliteDecisionStore {
    const config = loadConfig(options.config);
    return new SqliteDecisionStore(config.history.dbPath);
}
