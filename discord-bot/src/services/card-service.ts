/**
 * Card commands as seen by the chat layer.
 *
 * Every command for one session runs under its lock. User-facing failures
 * (AdjustError, RenderError) become error replies; anything else propagates.
 */

import type { CardSettings, RenderConfig, SessionKey } from "../types/card";
import { AdjustError, RenderError } from "../utils/errors";
import { logger } from "../utils/logger";
import {
  formatError,
  formatGuidance,
  formatPersonaDetail,
  formatPersonaGroups,
  formatPersonaList,
  formatSummary,
} from "../utils/messages";
import { looksLikeFlags, parseDrawFlags } from "../utils/tokenizer";
import { type CardVocabulary, configFromFlags, createDefaultConfig, sanitizeText } from "./card-factory";
import type { CardStateRepository } from "./card-state";
import type { CommandInterpreter } from "./interpreter";
import { SessionLocks } from "./locks";
import type { RenderCoordinator } from "./render-coordinator";

export interface CardReply {
  content: string;
  image?: Buffer;
  // only visible to the requester
  ephemeral?: boolean;
}

export interface CardServiceDeps {
  state: CardStateRepository;
  coordinator: RenderCoordinator;
  interpreter: CommandInterpreter;
  vocabulary: CardVocabulary;
  settings: CardSettings;
  random?: () => number;
  locks?: SessionLocks;
}

export class CardService {
  private readonly state: CardStateRepository;
  private readonly coordinator: RenderCoordinator;
  private readonly interpreter: CommandInterpreter;
  private readonly vocabulary: CardVocabulary;
  private readonly settings: CardSettings;
  private readonly random: () => number;
  private readonly locks: SessionLocks;

  constructor(deps: CardServiceDeps) {
    this.state = deps.state;
    this.coordinator = deps.coordinator;
    this.interpreter = deps.interpreter;
    this.vocabulary = deps.vocabulary;
    this.settings = deps.settings;
    this.random = deps.random ?? Math.random;
    this.locks = deps.locks ?? new SessionLocks();
  }

  /**
   * Create or refresh the session's card.
   *   ""            re-render the current card (or create the default one)
   *   plain text    current card (or default) with new text
   *   -n ... flags  a fresh card from defaults plus flags
   */
  async draw(key: SessionKey, input: string): Promise<CardReply> {
    return this.run(key, "draw", async () => {
      const trimmed = input.trim();
      const existing = this.state.find(key);
      let config: RenderConfig;

      if (!trimmed) {
        config = existing ?? createDefaultConfig(this.settings);
      } else if (looksLikeFlags(trimmed)) {
        config = configFromFlags(parseDrawFlags(trimmed), this.settings, this.vocabulary, this.random);
      } else {
        const base = existing ?? createDefaultConfig(this.settings);
        config = { ...base, text: sanitizeText(trimmed, this.settings.limits.maxTextLength) };
      }

      const headline = existing ? "🎨 Card re-rendered" : "🎨 Card created";
      const image = await this.coordinator.commitAndRender(key, config);
      return this.success(config, headline, image);
    });
  }

  /**
   * Apply one adjustment command to the existing card and re-render it.
   * Empty input returns the command guide.
   */
  async adjust(key: SessionKey, message: string): Promise<CardReply> {
    if (!message.trim()) {
      return { content: formatGuidance(), ephemeral: true };
    }

    return this.run(key, "adjust", async () => {
      const config = { ...this.state.require(key) };
      const confirmation = this.interpreter.execute(config, message);
      const image = await this.coordinator.commitAndRender(key, config);
      return this.success(config, confirmation, image);
    });
  }

  async reset(key: SessionKey): Promise<CardReply> {
    return this.run(key, "reset", async () => {
      const removed = this.state.delete(key);
      const content = removed
        ? "🗑️ Card reset. Use `/card draw` to start a new one."
        : "There is no card to reset.";
      return { content, ephemeral: true };
    });
  }

  /**
   * view: "all" (default), "groups", or a persona name/alias.
   */
  personas(view?: string | null): CardReply {
    const { catalog, personas } = this.vocabulary;
    const requested = view?.trim() ?? "";

    if (!requested || requested.toLowerCase() === "all") {
      return { content: formatPersonaList(catalog) };
    }
    if (requested.toLowerCase() === "groups") {
      return { content: formatPersonaGroups(catalog) };
    }

    const name = personas.resolve(requested);
    const persona = catalog.personas.find((entry) => entry.name === name);
    if (!persona) {
      return { content: formatError(`Unrecognized persona: ${requested}`), ephemeral: true };
    }
    return { content: formatPersonaDetail(catalog, persona) };
  }

  private success(config: RenderConfig, headline: string, image: Buffer): CardReply {
    return {
      content: this.settings.showSuccessMessages ? formatSummary(config, headline) : "",
      image,
    };
  }

  private async run(key: SessionKey, command: string, fn: () => Promise<CardReply>): Promise<CardReply> {
    logger.info(`Card ${command} for ${key.channel}:${key.identity}`);

    return this.locks.run(key, async () => {
      try {
        return await fn();
      } catch (error) {
        if (error instanceof AdjustError || error instanceof RenderError) {
          logger.info(`Card ${command} rejected for ${key.channel}:${key.identity}: ${error.message}`);
          return { content: formatError(error.message), ephemeral: true };
        }
        throw error;
      }
    });
  }
}
