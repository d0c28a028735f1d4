/**
 * /whitelist add|remove|list - Roles that automod ignores.
 */

import { PermissionFlagsBits, SlashCommandBuilder } from "discord.js";
import type { CommandContext } from "../../../src/core/CommandManager.js";
import { errorEmbed, successEmbed } from "../utils/embeds.js";

export const data = new SlashCommandBuilder()
  .setName("whitelist")
  .setDescription("Manage roles exempt from automod")
  .setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild)
  .addSubcommand((sub) =>
    sub
      .setName("add")
      .setDescription("Exempt a role from automod")
      .addRoleOption((opt) => opt.setName("role").setDescription("The role").setRequired(true)),
  )
  .addSubcommand((sub) =>
    sub
      .setName("remove")
      .setDescription("Stop exempting a role")
      .addRoleOption((opt) => opt.setName("role").setDescription("The role").setRequired(true)),
  )
  .addSubcommand((sub) => sub.setName("list").setDescription("List exempt roles"));

export const config = { allowInDMs: false };

export async function execute(context: CommandContext): Promise<void> {
  const { interaction, getPluginAPI } = context;
  const mod = getPluginAPI("moderation");
  if (!mod || !interaction.inGuild()) {
    await interaction.reply({ content: "Moderation plugin not loaded.", ephemeral: true });
    return;
  }

  const guildId = interaction.guildId;
  const sub = interaction.options.getSubcommand();

  if (sub === "list") {
    const roles = mod.whitelistService.list(guildId);
    const description = roles.length > 0 ? roles.map((id) => `• <@&${id}>`).join("\n") : "No roles are whitelisted.";
    await interaction.reply({ embeds: [successEmbed("Whitelisted Roles", description)], ephemeral: true });
    return;
  }

  await interaction.deferReply({ ephemeral: true });

  const role = interaction.options.getRole("role", true);
  const result = sub === "remove" ? await mod.whitelistService.remove(guildId, role.id) : await mod.whitelistService.add(guildId, role.id);

  if (!result.success) {
    await interaction.editReply({ embeds: [errorEmbed(result.error)] });
    return;
  }

  const message = sub === "remove" ? `<@&${role.id}> is no longer exempt from automod.` : `<@&${role.id}> is now exempt from automod.`;
  await interaction.editReply({ embeds: [successEmbed("Whitelist Updated", message)] });
}
