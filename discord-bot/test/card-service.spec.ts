import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DEFAULT_CARD_SETTINGS } from "../src/config/card";
import { createCardVocabulary } from "../src/services/card-factory";
import { CardService } from "../src/services/card-service";
import { CardStateRepository } from "../src/services/card-state";
import { DurableStore } from "../src/services/durable-store";
import { CommandInterpreter } from "../src/services/interpreter";
import { SessionLocks } from "../src/services/locks";
import { RenderCoordinator } from "../src/services/render-coordinator";
import { type CardRenderer, RendererHandle } from "../src/services/renderer";
import { SessionStore } from "../src/services/session-store";
import type { CardRenderRequest } from "../src/types/api";
import type { CardSettings, SessionKey } from "../src/types/card";
import { formatGuidance } from "../src/utils/messages";

class FakeRenderer implements CardRenderer {
  readonly requests: CardRenderRequest[] = [];
  failing = false;

  async initialize(): Promise<void> {}

  async render(request: CardRenderRequest): Promise<Buffer> {
    if (this.failing) {
      throw new Error("renderer down");
    }
    this.requests.push(request);
    return Buffer.from("png");
  }

  async close(): Promise<void> {}
}

const key: SessionKey = { channel: "discord", identity: "user-1" };
const TTL_HOURS = 24;

describe("CardService", () => {
  let dir: string;
  let durable: DurableStore;
  let renderer: FakeRenderer;

  const vocabulary = createCardVocabulary();

  const createService = (settings: CardSettings = DEFAULT_CARD_SETTINGS): {
    service: CardService;
    state: CardStateRepository;
    locks: SessionLocks;
  } => {
    const locks = new SessionLocks();
    const state = new CardStateRepository({
      sessions: new SessionStore(),
      durable,
      ttlHours: TTL_HOURS,
      limits: settings.limits,
    });
    const service = new CardService({
      state,
      coordinator: new RenderCoordinator(state, new RendererHandle(renderer), settings.render),
      interpreter: new CommandInterpreter(vocabulary, settings, () => 0),
      vocabulary,
      settings,
      random: () => 0,
      locks,
    });
    return { service, state, locks };
  };

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "card-service-"));
    durable = new DurableStore({ filePath: path.join(dir, "card-states.json") });
    renderer = new FakeRenderer();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("runs the create, adjust and persona scenario", async () => {
    const { service, state } = createService();

    const created = await service.draw(key, "hello");
    expect(created.content.split("\n")[0]).toBe("🎨 Card created");
    expect(created.image?.toString()).toBe("png");
    expect(state.require(key).text).toBe("hello");

    const font = await service.adjust(key, "font 999");
    expect(font.content.split("\n")[0]).toBe("🔠 Font size set to 84px (range 18-84)");
    expect(state.require(key).fontSize).toBe(84);

    await service.adjust(key, "position.up");
    await service.adjust(key, "position.up");
    expect(state.require(key).offsetY).toBe(-24);

    await service.adjust(key, "persona ichika");
    const persona = await service.adjust(key, "role MIKU");
    expect(persona.content.split("\n")[0]).toBe("🧑‍🎤 Persona switched to Hatsune Miku");
    expect(state.require(key)).toEqual({
      text: "hello",
      fontSize: 84,
      lineSpacing: 1.2,
      curveEnabled: false,
      offsetX: 0,
      offsetY: -24,
      role: "Hatsune Miku",
    });
  });

  it("summarizes the card after each change", async () => {
    const { service } = createService();
    await service.draw(key, "hello");

    const reply = await service.adjust(key, "curve on");

    expect(reply.content).toBe(
      [
        "〰️ Curve enabled",
        "",
        "Text: hello",
        "Font size: 42px",
        "Line spacing: 1.20",
        "Curve: on",
        "Position: X 0 / Y 0",
        "Persona: Hatsune Miku",
        "",
        "Quick actions: `/card adjust` font.up | font.down | spacing.up | spacing.down | " +
          "position.up | position.down | position.left | position.right | curve toggle",
      ].join("\n")
    );
  });

  it("sends the committed config and render options to the renderer", async () => {
    const { service } = createService();
    await service.draw(key, "hello");
    await service.adjust(key, "spacing 1.5");

    expect(renderer.requests.at(-1)).toEqual({
      text: "hello",
      persona: "Hatsune Miku",
      font_size: 42,
      line_spacing: 1.5,
      curve_enabled: false,
      offset_x: 0,
      offset_y: 0,
      curve_intensity: 0.5,
      shadow_enabled: true,
      emoji_set: "apple",
    });
  });

  it("leaves the persona unchanged after an invalid persona", async () => {
    const { service, state } = createService();
    await service.draw(key, "hello");
    const rendersBefore = renderer.requests.length;

    const reply = await service.adjust(key, "role not-a-real-persona");

    expect(reply.ephemeral).toBe(true);
    expect(reply.image).toBeUndefined();
    expect(reply.content.split("\n")[0]).toBe("⚠️ Unrecognized persona: not-a-real-persona");
    expect(state.require(key).role).toBe("Hatsune Miku");
    expect(renderer.requests.length).toBe(rendersBefore);
  });

  it("asks for a card before adjusting", async () => {
    const { service } = createService();

    const reply = await service.adjust(key, "font.up");

    expect(reply.content.split("\n")[0]).toBe("⚠️ No card found. Create one first with /card draw.");
  });

  it("returns the guide for an empty adjustment", async () => {
    const { service } = createService();
    expect(await service.adjust(key, "  ")).toEqual({ content: formatGuidance(), ephemeral: true });
  });

  it("keeps committed state when rendering fails", async () => {
    const { service, state } = createService();
    await service.draw(key, "hello");
    renderer.failing = true;

    const reply = await service.adjust(key, "font.up");

    expect(reply.content.split("\n")[0]).toBe("⚠️ Rendering failed. Your changes were saved; try again shortly.");
    expect(state.require(key).fontSize).toBe(46);
    expect(durable.get(key, TTL_HOURS)?.fontSize).toBe(46);
  });

  it("restores state from disk after a restart", async () => {
    const first = createService();
    await first.service.draw(key, "persisted");
    await first.service.adjust(key, "font 60");

    const second = createService();
    const reply = await second.service.adjust(key, "font.down");

    expect(reply.content.split("\n")[0]).toBe("🔠 Font size decreased to 56px");
    expect(second.state.require(key).text).toBe("persisted");
  });

  it("steps from the new bound after a restart with a lower font maximum", async () => {
    const first = createService();
    await first.service.draw(key, "hello");
    await first.service.adjust(key, "font 84");

    const lowered = { ...DEFAULT_CARD_SETTINGS, limits: { ...DEFAULT_CARD_SETTINGS.limits, fontSizeMax: 60 } };
    const second = createService(lowered);
    const reply = await second.service.adjust(key, "font.up");

    expect(reply.content.split("\n")[0]).toBe("🔠 Font size is already at the upper bound (60px)");
    expect(second.state.require(key).fontSize).toBe(60);
  });

  describe("draw", () => {
    it("re-renders an existing card for empty input", async () => {
      const { service, state } = createService();
      await service.draw(key, "hello");
      await service.adjust(key, "font 60");

      const reply = await service.draw(key, "");

      expect(reply.content.split("\n")[0]).toBe("🎨 Card re-rendered");
      expect(state.require(key).fontSize).toBe(60);
    });

    it("creates the default card for empty input", async () => {
      const { service, state } = createService();
      await service.draw(key, "");
      expect(state.require(key).text).toBe("This is a new card");
    });

    it("replaces only the text for plain input", async () => {
      const { service, state } = createService();
      await service.draw(key, "hello");
      await service.adjust(key, "position right");

      await service.draw(key, "  new   text ");

      expect(state.require(key).text).toBe("new text");
      expect(state.require(key).offsetX).toBe(12);
    });

    it("keeps dash-led text that is not a flag", async () => {
      const { service, state } = createService();
      await service.draw(key, "-_-");
      expect(state.require(key).text).toBe("-_-");
    });

    it("builds a fresh card from flags", async () => {
      const { service, state } = createService();
      await service.draw(key, "hello");
      await service.adjust(key, "position right");

      await service.draw(key, '-n "Hi there" -s 50 -c -r saki');

      expect(state.require(key)).toEqual({
        text: "Hi there",
        fontSize: 50,
        lineSpacing: 1.2,
        curveEnabled: true,
        offsetX: 0,
        offsetY: 0,
        role: "Tenma Saki",
      });
    });

    it("reports an unknown persona flag", async () => {
      const { service, state } = createService();
      const reply = await service.draw(key, "-n Hi -r nobody");

      expect(reply.content.split("\n")[0]).toBe("⚠️ Unrecognized persona: nobody");
      expect(state.find(key)).toBeUndefined();
    });

    it("omits the summary when success messages are off", async () => {
      const { service } = createService({ ...DEFAULT_CARD_SETTINGS, showSuccessMessages: false });
      const reply = await service.draw(key, "hello");

      expect(reply.content).toBe("");
      expect(reply.image?.toString()).toBe("png");
    });
  });

  it("applies concurrent adjustments for one session in order", async () => {
    const { service, state, locks } = createService();
    await service.draw(key, "hello");

    await Promise.all([service.adjust(key, "position right"), service.adjust(key, "position right")]);

    expect(state.require(key).offsetX).toBe(24);
    expect(locks.stats).toEqual({ lockedSessions: 0, pendingCommands: 0 });
  });

  it("resets the card in both tiers", async () => {
    const { service, state } = createService();
    await service.draw(key, "hello");

    expect((await service.reset(key)).content).toBe("🗑️ Card reset. Use `/card draw` to start a new one.");
    expect(state.find(key)).toBeUndefined();
    expect(durable.get(key, TTL_HOURS)).toBeUndefined();
    expect((await service.reset(key)).content).toBe("There is no card to reset.");
  });

  describe("personas", () => {
    it("lists every persona", () => {
      const { service } = createService();
      const lines = service.personas().content.split("\n");
      expect(lines[0]).toBe("**Personas** (8)");
      expect(lines[1]).toBe("• Hatsune Miku");
      expect(lines).toHaveLength(9);
    });

    it("lists personas by group", () => {
      const { service } = createService();
      const content = service.personas("groups").content;
      expect(content.split("\n").slice(0, 7)).toEqual([
        "**Personas by group**",
        "",
        "__Leo/need__",
        "• Hoshino Ichika",
        "• Tenma Saki",
        "• Mochizuki Honami",
        "• Hinomori Shiho",
      ]);
    });

    it("shows one persona by alias", () => {
      const { service } = createService();
      expect(service.personas("miku").content).toBe(
        "**Hatsune Miku**\nGroup: MORE MORE JUMP!\nAliases: 初音未来, 初音, miku, hatsune, hatsune miku"
      );
    });

    it("reports an unknown persona", () => {
      const { service } = createService();
      const reply = service.personas("nobody");
      expect(reply.ephemeral).toBe(true);
      expect(reply.content.split("\n")[0]).toBe("⚠️ Unrecognized persona: nobody");
    });
  });
});
