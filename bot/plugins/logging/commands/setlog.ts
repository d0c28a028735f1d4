/**
 * /setlog [channel] [type] - Set or clear the audit log channel.
 */

import { ChannelType, PermissionFlagsBits, SlashCommandBuilder } from "discord.js";
import type { CommandContext } from "../../../src/core/CommandManager.js";
import { errorEmbed, successEmbed } from "../../moderation/utils/embeds.js";
import { LogChannelType, isLogChannelType } from "../models/LogChannels.js";

export const data = new SlashCommandBuilder()
  .setName("setlog")
  .setDescription("Set the channel that receives moderation logs")
  .setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild)
  .addChannelOption((opt) =>
    opt.setName("channel").setDescription("Log channel (omit to clear)").setRequired(false).addChannelTypes(ChannelType.GuildText),
  )
  .addStringOption((opt) =>
    opt
      .setName("type")
      .setDescription("Which logs go to this channel")
      .setRequired(false)
      .addChoices(
        { name: "All logs", value: LogChannelType.ALL },
        { name: "Moderation actions", value: LogChannelType.MOD },
        { name: "Member joins and leaves", value: LogChannelType.MEMBER },
        { name: "Deleted and edited messages", value: LogChannelType.MESSAGE },
      ),
  );

export const config = { allowInDMs: false };

export async function execute(context: CommandContext): Promise<void> {
  const { interaction, getPluginAPI } = context;
  const logging = getPluginAPI("logging");
  if (!logging || !interaction.inGuild()) {
    await interaction.reply({ content: "Logging plugin not loaded.", ephemeral: true });
    return;
  }

  await interaction.deferReply({ ephemeral: true });

  const rawType = interaction.options.getString("type") ?? LogChannelType.ALL;
  const type = isLogChannelType(rawType) ? rawType : LogChannelType.ALL;
  const channel = interaction.options.getChannel("channel");

  if (!channel) {
    const result = await logging.auditLog.clearChannel(interaction.guildId, type);
    if (!result.success) {
      await interaction.editReply({ embeds: [errorEmbed(result.error)] });
      return;
    }
    await interaction.editReply({ embeds: [successEmbed("Logging Channel Cleared", `The ${type} log channel was removed.`)] });
    return;
  }

  const result = await logging.auditLog.setChannel(interaction.guildId, type, channel.id, interaction.user.id);
  if (!result.success) {
    await interaction.editReply({ embeds: [errorEmbed(result.error)] });
    return;
  }

  await interaction.editReply({
    embeds: [successEmbed("Logging Channel Set", `Successfully set ${type} logging channel to <#${channel.id}>`)],
  });
}
