/**
 * /automod view|set|blockword|linkwhitelist|toggle - Automod thresholds and
 * word/link lists for this server.
 */

import { PermissionFlagsBits, SlashCommandBuilder } from "discord.js";
import { THRESHOLD_KEYS } from "../models/GuildConfig.js";

export const data = new SlashCommandBuilder()
  .setName("automod")
  .setDescription("Manage automod settings")
  .setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild)
  .addSubcommand((sub) => sub.setName("view").setDescription("View current automod configuration"))
  .addSubcommand((sub) =>
    sub
      .setName("set")
      .setDescription("Change a detection threshold")
      .addStringOption((opt) =>
        opt
          .setName("setting")
          .setDescription("Threshold to change")
          .setRequired(true)
          .addChoices(...THRESHOLD_KEYS.map((key) => ({ name: key, value: key }))),
      )
      .addNumberOption((opt) => opt.setName("value").setDescription("New value (caps threshold is a ratio from 0 to 1)").setRequired(true).setMinValue(0)),
  )
  .addSubcommand((sub) =>
    sub
      .setName("blockword")
      .setDescription("Add or remove a blocked word")
      .addStringOption((opt) =>
        opt.setName("action").setDescription("Add or remove").setRequired(true).addChoices({ name: "add", value: "add" }, { name: "remove", value: "remove" }),
      )
      .addStringOption((opt) => opt.setName("word").setDescription("The word").setRequired(true).setMaxLength(100)),
  )
  .addSubcommand((sub) =>
    sub
      .setName("linkwhitelist")
      .setDescription("Add or remove a whitelisted link domain")
      .addStringOption((opt) =>
        opt.setName("action").setDescription("Add or remove").setRequired(true).addChoices({ name: "add", value: "add" }, { name: "remove", value: "remove" }),
      )
      .addStringOption((opt) => opt.setName("domain").setDescription("Domain, e.g. example.com").setRequired(true).setMaxLength(253)),
  )
  .addSubcommand((sub) =>
    sub
      .setName("toggle")
      .setDescription("Enable or disable automod")
      .addBooleanOption((opt) => opt.setName("enabled").setDescription("Whether automod runs").setRequired(true)),
  );

export const config = { allowInDMs: false };

// Execution delegated to subcommands/automod/index.ts
export { execute } from "../subcommands/automod/index.js";
