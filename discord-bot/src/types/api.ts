/**
 * API types for the Card Render Service.
 */

export interface CardRenderRequest {
  text: string;
  persona: string;
  font_size: number;
  line_spacing: number;
  curve_enabled: boolean;
  offset_x: number;
  offset_y: number;
  curve_intensity: number;
  shadow_enabled: boolean;
  emoji_set: string;
}

export interface ApiError {
  detail: string;
}

export interface HealthResponse {
  status: string;
  service: string;
}
