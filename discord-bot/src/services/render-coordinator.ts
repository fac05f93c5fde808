/**
 * Commits a config to both store tiers, then renders it.
 */

import type { CardRenderRequest } from "../types/api";
import type { CardRenderOptions, RenderConfig, SessionKey } from "../types/card";
import { RenderError } from "../utils/errors";
import { logger } from "../utils/logger";
import type { CardStateRepository } from "./card-state";
import type { RendererHandle } from "./renderer";

export function toRenderRequest(config: RenderConfig, options: CardRenderOptions): CardRenderRequest {
  return {
    text: config.text,
    persona: config.role,
    font_size: config.fontSize,
    line_spacing: config.lineSpacing,
    curve_enabled: config.curveEnabled,
    offset_x: config.offsetX,
    offset_y: config.offsetY,
    curve_intensity: options.curveIntensity,
    shadow_enabled: options.shadowEnabled,
    emoji_set: options.emojiSet,
  };
}

export class RenderCoordinator {
  private readonly state: CardStateRepository;
  private readonly renderer: RendererHandle;
  private readonly options: CardRenderOptions;

  constructor(state: CardStateRepository, renderer: RendererHandle, options: CardRenderOptions) {
    this.state = state;
    this.renderer = renderer;
    this.options = options;
  }

  /**
   * State is saved before the renderer runs, so a render failure keeps it.
   */
  async commitAndRender(key: SessionKey, config: RenderConfig): Promise<Buffer> {
    this.state.save(key, config);

    try {
      const renderer = await this.renderer.acquire();
      try {
        return await renderer.render(toRenderRequest(config, this.options));
      } finally {
        this.renderer.release();
      }
    } catch (error) {
      logger.error(`Card render failed for ${key.channel}:${key.identity}:`, error);
      throw new RenderError("Rendering failed. Your changes were saved; try again shortly.", error);
    }
  }
}
