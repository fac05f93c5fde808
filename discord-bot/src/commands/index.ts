/**
 * Command registry and definitions.
 *
 * Everything lives under one /card command:
 * - /card draw [options]      create or refresh your card
 * - /card adjust [command]    change one setting (no command shows the guide)
 * - /card reset               forget your card
 * - /card personas [view]     list personas, by group, or one persona
 */

import {
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  type RESTPostAPIChatInputApplicationCommandsJSONBody,
} from "discord.js";

import { logger } from "../utils/logger";
import {
  type CardCommandContext,
  handleCardAdjust,
  handleCardDraw,
  handleCardPersonas,
  handleCardReset,
} from "./card";

// Command definitions
export const commands: RESTPostAPIChatInputApplicationCommandsJSONBody[] = [
  new SlashCommandBuilder()
    .setName("card")
    .setDescription("Build a persona text card")
    .addSubcommand((subcommand) =>
      subcommand
        .setName("draw")
        .setDescription("Create or refresh your card")
        .addStringOption((option) =>
          option
            .setName("options")
            .setDescription('Card text, or flags: -n "text" -s 48 -l 1.8 -c -x 12 -y -6 -r miku --daf')
            .setRequired(false)
            .setMaxLength(500)
        )
    )
    .addSubcommand((subcommand) =>
      subcommand
        .setName("adjust")
        .setDescription("Adjust your card, e.g. font.up, position left 24, persona miku")
        .addStringOption((option) =>
          option
            .setName("command")
            .setDescription("Adjustment command (leave empty for the guide)")
            .setRequired(false)
            .setMaxLength(500)
        )
    )
    .addSubcommand((subcommand) =>
      subcommand
        .setName("reset")
        .setDescription("Delete your current card")
    )
    .addSubcommand((subcommand) =>
      subcommand
        .setName("personas")
        .setDescription("List the available personas")
        .addStringOption((option) =>
          option
            .setName("view")
            .setDescription('"all", "groups", or a persona name')
            .setRequired(false)
            .setMaxLength(100)
        )
    )
    .toJSON(),
];

/**
 * Main command handler.
 */
export async function handleCommand(
  interaction: ChatInputCommandInteraction,
  context: CardCommandContext
): Promise<void> {
  const commandName = interaction.commandName;

  if (commandName !== "card") {
    await interaction.reply({
      content: `Unknown command: ${commandName}`,
      ephemeral: true,
    });
    return;
  }

  try {
    await handleCardCommand(interaction, context);
  } catch (error) {
    logger.error(`Command execution failed: ${commandName}`, error);

    const replyOptions = {
      content: "Something went wrong while handling that command. Please try again later.",
      ephemeral: true,
    };

    if (interaction.replied || interaction.deferred) {
      await interaction.followUp(replyOptions);
    } else {
      await interaction.reply(replyOptions);
    }
  }
}

/**
 * Handle card subcommands.
 */
async function handleCardCommand(
  interaction: ChatInputCommandInteraction,
  context: CardCommandContext
): Promise<void> {
  const subcommand = interaction.options.getSubcommand();

  switch (subcommand) {
    case "draw":
      await handleCardDraw(interaction, context);
      break;
    case "adjust":
      await handleCardAdjust(interaction, context);
      break;
    case "reset":
      await handleCardReset(interaction, context);
      break;
    case "personas":
      await handleCardPersonas(interaction, context);
      break;
    default:
      await interaction.reply({
        content: `Unknown subcommand: ${subcommand}`,
        ephemeral: true,
      });
  }
}
