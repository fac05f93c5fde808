/**
 * /card subcommand handlers.
 *
 * Rendering can take a few seconds, so draw and adjust defer the reply and
 * edit it once the card service answers.
 */

import {
  AttachmentBuilder,
  EmbedBuilder,
  type ChatInputCommandInteraction,
} from "discord.js";
import type { SessionScope } from "../config/env";
import type { CardReply, CardService } from "../services/card-service";
import type { RequesterIdentity, SessionKey } from "../types/card";
import { DISCORD_CHANNEL, resolveSessionKey } from "../utils/identity";

export const CARD_IMAGE_NAME = "card.png";
const EMBED_COLOR = 0x9945ff;
const EMBED_DESCRIPTION_LIMIT = 4096;

export interface CardCommandContext {
  cards: CardService;
  sessionScope: SessionScope;
}

export interface CardReplyPayload {
  content?: string;
  embeds?: EmbedBuilder[];
  files?: AttachmentBuilder[];
}

// The parts of an interaction that identify the requester
export interface InteractionRequester {
  channelId: string;
  user: { id: string; username: string };
  member: object | null;
}

/**
 * Who is asking. In channel scope the channel id is the explicit session id,
 * so everyone in the channel shares one card.
 */
export function requesterFromInteraction(
  interaction: InteractionRequester,
  scope: SessionScope
): RequesterIdentity {
  const member = interaction.member;
  const displayName =
    member && "displayName" in member && typeof member.displayName === "string" ? member.displayName : null;
  return {
    sessionId: scope === "channel" ? interaction.channelId : null,
    senderId: interaction.user.id,
    senderName: displayName ?? interaction.user.username,
  };
}

export function sessionKeyFor(
  interaction: InteractionRequester,
  scope: SessionScope
): SessionKey {
  return resolveSessionKey(DISCORD_CHANNEL, requesterFromInteraction(interaction, scope));
}

/**
 * Text-only replies go out as plain content; a rendered card goes out as an
 * embed wrapping the attachment.
 */
export function toReplyPayload(reply: CardReply): CardReplyPayload {
  if (!reply.image) {
    return { content: reply.content };
  }

  const attachment = new AttachmentBuilder(reply.image, {
    name: CARD_IMAGE_NAME,
    description: "Rendered persona card",
  });
  const embed = new EmbedBuilder()
    .setColor(EMBED_COLOR)
    .setImage(`attachment://${CARD_IMAGE_NAME}`);

  if (reply.content) {
    embed.setDescription(
      reply.content.length > EMBED_DESCRIPTION_LIMIT
        ? reply.content.substring(0, EMBED_DESCRIPTION_LIMIT - 3) + "..."
        : reply.content
    );
  }

  return { embeds: [embed], files: [attachment] };
}

// The parts of an interaction a deferred card reply goes through
export interface DeferredReplyTarget {
  deferReply(): Promise<unknown>;
  editReply(payload: CardReplyPayload): Promise<unknown>;
  deleteReply(): Promise<void>;
  followUp(options: { content: string; ephemeral: boolean }): Promise<unknown>;
}

/**
 * The deferred "thinking" message is public. An ephemeral reply (an error)
 * replaces it with a private follow-up instead of editing it.
 */
export async function renderAndReply(
  interaction: DeferredReplyTarget,
  produce: () => Promise<CardReply>
): Promise<void> {
  await interaction.deferReply();
  const reply = await produce();

  if (reply.ephemeral) {
    await interaction.deleteReply();
    await interaction.followUp({ content: reply.content, ephemeral: true });
    return;
  }
  await interaction.editReply(toReplyPayload(reply));
}

export async function handleCardDraw(
  interaction: ChatInputCommandInteraction,
  context: CardCommandContext
): Promise<void> {
  const options = interaction.options.getString("options") ?? "";
  const key = sessionKeyFor(interaction, context.sessionScope);
  await renderAndReply(interaction, () => context.cards.draw(key, options));
}

export async function handleCardAdjust(
  interaction: ChatInputCommandInteraction,
  context: CardCommandContext
): Promise<void> {
  const command = interaction.options.getString("command") ?? "";
  const key = sessionKeyFor(interaction, context.sessionScope);

  if (!command.trim()) {
    const reply = await context.cards.adjust(key, command);
    await interaction.reply({ content: reply.content, ephemeral: true });
    return;
  }

  await renderAndReply(interaction, () => context.cards.adjust(key, command));
}

export async function handleCardReset(
  interaction: ChatInputCommandInteraction,
  context: CardCommandContext
): Promise<void> {
  const key = sessionKeyFor(interaction, context.sessionScope);
  const reply = await context.cards.reset(key);
  await interaction.reply({ content: reply.content, ephemeral: reply.ephemeral ?? false });
}

export async function handleCardPersonas(
  interaction: ChatInputCommandInteraction,
  context: CardCommandContext
): Promise<void> {
  const reply = context.cards.personas(interaction.options.getString("view"));
  await interaction.reply({ content: reply.content, ephemeral: reply.ephemeral ?? false });
}
