import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";

import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { ConfigurationError } from "@fleetroute/core";

import { createRuntime, resolveConfig } from "../../src/runtime.js";

describe("runtime", () => {
    let dir: string;
    let configFile: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), "fleetroute-cli-"));
        configFile = join(dir, "fleetroute.yaml");
        writeFileSync(
            configFile,
            [
                "engine:",
                "  strategy: heuristic",
                "history:",
                `  db_path: ${join(dir, "history.db")}`,
                "logging:",
                '  file: ""',
                "",
            ].join("\n"),
        );
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    describe("resolveConfig", () => {
        it("applies command-line overrides", () => {
            const config = resolveConfig({
                config: configFile,
                strategy: "blended",
                model: "/models/fleetroute-classifier.json",
                verbose: true,
            });
            expect(config.engine.strategy).toBe("blended");
            expect(config.engine.classifierPath).toBe("/models/fleetroute-classifier.json");
            expect(config.logging.level).toBe("DEBUG");
        });

        it("keeps file values without overrides", () => {
            const config = resolveConfig({ config: configFile });
            expect(config.engine.strategy).toBe("heuristic");
            expect(config.engine.classifierPath).toBeUndefined();
            expect(config.logging.level).toBe("INFO");
        });

        it("rejects an unknown strategy", () => {
            expect(() => resolveConfig({ config: configFile, strategy: "random" })).toThrow(
                new ConfigurationError("Unknown strategy 'random' (expected one of heuristic, classifier, blended)"),
            );
        });
    });

    describe("createRuntime", () => {
        it("wires the configured fleet, engine and history store", () => {
            const runtime = createRuntime({ config: configFile });
            try {
                expect(runtime.registry.size()).toBe(5);
                expect(runtime.engine.strategyName).toBe("heuristic");
                expect(runtime.store).not.toBeNull();

                runtime.engine.decide({ id: "r1", taskType: "generic", priority: 5 }).complete({
                    success: true,
                    latencyMs: 10,
                    cost: 0.01,
                });
                expect(runtime.store?.history().map((e) => e.taskId)).toEqual(["r1"]);
            } finally {
                runtime.close();
            }
        });

        it("skips the store with --no-history", () => {
            const runtime = createRuntime({ config: configFile, history: false });
            expect(runtime.store).toBeNull();
            runtime.close();
        });

        it("starts degraded when the classifier model is missing", () => {
            const runtime = createRuntime({
                config: configFile,
                strategy: "classifier",
                model: join(dir, "absent.json"),
                history: false,
            });
            expect(runtime.engine.degraded).toBe(true);
            expect(runtime.engine.strategyName).toBe("heuristic");
            runtime.close();
        });
    });
});
