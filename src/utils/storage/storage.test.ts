import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { Storage } from "./storage";

describe("Storage", () => {
    let root: string;

    beforeEach(() => {
        root = mkdtempSync(join(tmpdir(), "storage-test-"));
    });

    afterEach(() => {
        rmSync(root, { recursive: true, force: true });
    });

    it("places config under a dot directory named after the tool", () => {
        const storage = new Storage("test-tool", root);
        expect(storage.getBaseDir()).toBe(join(root, ".test-tool"));
        expect(storage.getConfigPath()).toBe(join(root, ".test-tool", "config.json"));
    });

    it("returns null when no config file exists", async () => {
        const storage = new Storage("test-tool", root);
        expect(await storage.getConfig()).toBeNull();
    });

    it("parses an existing config file", async () => {
        const storage = new Storage("test-tool", root);
        mkdirSync(storage.getBaseDir(), { recursive: true });
        writeFileSync(storage.getConfigPath(), JSON.stringify({ maxLength: 120 }));

        expect(await storage.getConfig()).toEqual({ maxLength: 120 });
    });

    it("returns null for malformed JSON", async () => {
        const storage = new Storage("test-tool", root);
        mkdirSync(storage.getBaseDir(), { recursive: true });
        writeFileSync(storage.getConfigPath(), "{ not json");

        expect(await storage.getConfig()).toBeNull();
    });
});
