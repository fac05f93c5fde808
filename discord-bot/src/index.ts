/**
 * Discord Bot Entry Point
 *
 * Main file that initializes the Discord client and handles events.
 *
 * Features:
 * - /card slash command (draw, adjust, reset, personas)
 * - Card state kept in memory and on disk, with a periodic cleanup sweep
 * - Health check endpoint for the container platform
 */

import "dotenv/config";

import http from "node:http";
import path from "node:path";
import {
  Client,
  GatewayIntentBits,
  REST,
  Routes,
  Events,
} from "discord.js";

import { loadConfig } from "./config/env";
import { commands, handleCommand } from "./commands";
import type { CardCommandContext } from "./commands/card";
import { createCardVocabulary } from "./services/card-factory";
import { CardService } from "./services/card-service";
import { CardStateRepository } from "./services/card-state";
import { DurableStore } from "./services/durable-store";
import { CommandInterpreter } from "./services/interpreter";
import { startCleanupSchedule } from "./services/maintenance";
import { RenderCoordinator } from "./services/render-coordinator";
import { HttpCardRenderer, RendererHandle } from "./services/renderer";
import { SessionStore } from "./services/session-store";
import { logger } from "./utils/logger";

const config = loadConfig();

// Card services
const vocabulary = createCardVocabulary();
const sessions = new SessionStore();
const durable = config.storage.persistenceEnabled
  ? new DurableStore({ filePath: path.resolve(config.storage.path) })
  : undefined;
const state = new CardStateRepository({
  sessions,
  durable,
  ttlHours: config.storage.ttlHours,
  limits: config.card.limits,
});
const renderer = new RendererHandle(
  new HttpCardRenderer({ baseUrl: config.renderer.url, timeoutMs: config.renderer.timeoutMs })
);
const cards = new CardService({
  state,
  coordinator: new RenderCoordinator(state, renderer, config.card.render),
  interpreter: new CommandInterpreter(vocabulary, config.card),
  vocabulary,
  settings: config.card,
});
const context: CardCommandContext = { cards, sessionScope: config.discord.sessionScope };

// Health check server
let isReady = false;

const server = http.createServer((req, res) => {
  const url = new URL(req.url ?? "/", "http://localhost");
  if (url.pathname === "/health" || url.pathname === "/") {
    const status = isReady ? 200 : 503;
    const body = isReady ? { status: "healthy", service: "discord-bot" } : { status: "starting" };
    res.writeHead(status, { "Content-Type": "application/json" });
    res.end(JSON.stringify(body));
    return;
  }
  res.writeHead(404, { "Content-Type": "text/plain" });
  res.end("Not Found");
});

server.listen(config.health.port, () => {
  logger.info(`Health check server listening on port ${config.health.port}`);
});

// Create Discord client with required intents
const client = new Client({
  intents: [GatewayIntentBits.Guilds],
});

// Register slash commands
async function registerCommands(): Promise<void> {
  const rest = new REST({ version: "10" }).setToken(config.discord.token);

  try {
    logger.info("Registering slash commands...");
    logger.info(`Commands to register (${commands.length}):`);
    for (const cmd of commands) {
      logger.info(`  - /${cmd.name}: ${cmd.description}`);
    }

    const result: unknown = await rest.put(Routes.applicationCommands(config.discord.applicationId), {
      body: commands,
    });

    const registered = Array.isArray(result) ? result.length : 0;
    logger.info(`Successfully registered ${registered} commands with Discord`);
  } catch (error) {
    logger.error("Failed to register commands:", error);
    throw error;
  }
}

// Event handlers
client.once(Events.ClientReady, (readyClient) => {
  isReady = true;
  logger.info("=".repeat(50));
  logger.info(`Discord bot ready!`);
  logger.info(`Logged in as: ${readyClient.user.tag}`);
  logger.info(`Application ID: ${config.discord.applicationId}`);
  logger.info(`Render Service: ${config.renderer.url}`);
  logger.info(`Session scope: ${config.discord.sessionScope}`);
  logger.info(`Card persistence: ${durable ? durable.filePath : "disabled"}`);
  logger.info("=".repeat(50));
});

client.on(Events.InteractionCreate, async (interaction) => {
  if (!interaction.isChatInputCommand()) return;

  try {
    await handleCommand(interaction, context);
  } catch (error) {
    logger.error("Command execution failed:", error);

    const errorMessage = "An error occurred while executing this command.";

    try {
      if (interaction.replied || interaction.deferred) {
        await interaction.followUp({ content: errorMessage, ephemeral: true });
      } else {
        await interaction.reply({ content: errorMessage, ephemeral: true });
      }
    } catch (replyError) {
      logger.error("Failed to send error reply:", replyError);
    }
  }
});

client.on(Events.Error, (error) => {
  logger.error("Discord client error:", error);
});

const stopCleanup =
  config.storage.cleanupIntervalMinutes > 0
    ? startCleanupSchedule(
        { sessions, durable, ttlHours: config.storage.ttlHours },
        config.storage.cleanupIntervalMinutes * 60 * 1000
      )
    : () => {};

// Main startup
async function main(): Promise<void> {
  try {
    logger.info("Starting Discord bot...");

    // Register commands first
    await registerCommands();

    // Login to Discord
    await client.login(config.discord.token);
  } catch (error) {
    logger.error("Failed to start bot:", error);
    process.exit(1);
  }
}

// Handle graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`Received ${signal}, shutting down...`);
  stopCleanup();
  try {
    await renderer.close();
  } catch (error) {
    logger.error("Failed to close renderer:", error);
  }
  await client.destroy();
  server.close();
  process.exit(0);
}

process.on("SIGINT", () => {
  void shutdown("SIGINT");
});

process.on("SIGTERM", () => {
  void shutdown("SIGTERM");
});

// Start the bot
void main();
