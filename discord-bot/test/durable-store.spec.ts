import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DEFAULT_CARD_SETTINGS } from "../src/config/card";
import { createDefaultConfig } from "../src/services/card-factory";
import { DurableStore } from "../src/services/durable-store";
import type { RenderConfig, SessionKey } from "../src/types/card";

const HOUR = 3600;
const START = 1_700_000_000;

const key: SessionKey = { channel: "discord", identity: "user-1" };
const otherKey: SessionKey = { channel: "discord", identity: "user-2" };

const sampleConfig = (): RenderConfig => ({
  ...createDefaultConfig(DEFAULT_CARD_SETTINGS, "hello"),
  fontSize: 50,
  lineSpacing: 1.5,
  curveEnabled: true,
  offsetX: 12,
  offsetY: -24,
  role: "Tenma Saki",
});

describe("DurableStore", () => {
  let dir: string;
  let filePath: string;
  let clock: number;
  let store: DurableStore;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "card-states-"));
    filePath = path.join(dir, "nested", "card-states.json");
    clock = START;
    store = new DurableStore({ filePath, now: () => clock });
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("round-trips a config", () => {
    store.set(key, sampleConfig());
    expect(store.get(key, 24)).toEqual(sampleConfig());
  });

  it("writes the documented layout", () => {
    store.set(key, sampleConfig());
    const document = JSON.parse(fs.readFileSync(filePath, "utf-8"));

    expect(document.last_updated).toBe(START);
    expect(document.states["discord:user-1"]).toEqual({
      config: {
        text: "hello",
        font_size: 50,
        line_spacing: 1.5,
        curve_enabled: true,
        offset_x: 12,
        offset_y: -24,
        role: "Tenma Saki",
      },
      timestamp: START,
    });
  });

  it("keeps an entry that is exactly at the TTL", () => {
    store.set(key, sampleConfig());
    clock = START + 24 * HOUR;
    expect(store.get(key, 24)).toEqual(sampleConfig());
  });

  it("expires and removes entries older than the TTL", () => {
    store.set(key, sampleConfig());
    store.set(otherKey, sampleConfig());
    clock = START + 24 * HOUR + 1;

    expect(store.get(key, 24)).toBeUndefined();
    expect(store.getAll().has("discord:user-1")).toBe(false);
    expect(store.getAll().has("discord:user-2")).toBe(true);
  });

  it("treats a missing document as empty", () => {
    expect(store.get(key, 24)).toBeUndefined();
    expect(store.getAll().size).toBe(0);
    expect(store.delete(key)).toBe(false);
    expect(store.cleanupExpired(24)).toBe(0);
    expect(fs.existsSync(filePath)).toBe(false);
  });

  it("treats a corrupt document as empty and recovers on the next write", () => {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, "not json", "utf-8");

    expect(store.get(key, 24)).toBeUndefined();
    store.set(key, sampleConfig());
    expect(store.get(key, 24)).toEqual(sampleConfig());
  });

  it("deletes entries and reports whether anything was removed", () => {
    store.set(key, sampleConfig());
    expect(store.delete(key)).toBe(true);
    expect(store.delete(key)).toBe(false);
    expect(store.get(key, 24)).toBeUndefined();
  });

  it("removes only expired entries during cleanup", () => {
    store.set(key, sampleConfig());
    clock = START + 10 * HOUR;
    store.set(otherKey, sampleConfig());
    clock = START + 30 * HOUR;

    expect(store.cleanupExpired(24)).toBe(1);
    expect([...store.getAll().keys()]).toEqual(["discord:user-2"]);
  });

  it("skips invalid entries in getAll", () => {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(
      filePath,
      JSON.stringify({
        states: {
          "discord:bad": { config: { text: 1 }, timestamp: START },
          "discord:no-time": { config: { text: "x" } },
          "discord:user-1": {
            config: {
              text: "ok",
              font_size: 42,
              line_spacing: 1.2,
              curve_enabled: false,
              offset_x: 0,
              offset_y: 0,
              role: "Hatsune Miku",
            },
            timestamp: START,
          },
        },
        last_updated: START,
      }),
      "utf-8"
    );

    const all = store.getAll();
    expect([...all.keys()]).toEqual(["discord:user-1"]);
    expect(all.get("discord:user-1")?.text).toBe("ok");
    expect(store.get({ channel: "discord", identity: "bad" }, 24)).toBeUndefined();
  });

  it("logs and drops write failures", () => {
    const blocker = path.join(dir, "blocker");
    fs.writeFileSync(blocker, "", "utf-8");
    const broken = new DurableStore({ filePath: path.join(blocker, "card-states.json"), now: () => clock });

    expect(() => broken.set(key, sampleConfig())).not.toThrow();
    expect(broken.get(key, 24)).toBeUndefined();
  });
});
