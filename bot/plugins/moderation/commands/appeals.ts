/**
 * /appeals list|approve|deny - Review stored appeals.
 */

import { EmbedBuilder, PermissionFlagsBits, SlashCommandBuilder } from "discord.js";
import type { CommandContext } from "../../../src/core/CommandManager.js";
import { AppealStatus } from "../models/Appeal.js";
import { ACTION_COLORS } from "../utils/constants.js";
import { errorEmbed, relativeTime, successEmbed } from "../utils/embeds.js";

export const data = new SlashCommandBuilder()
  .setName("appeals")
  .setDescription("Review member appeals")
  .setDefaultMemberPermissions(PermissionFlagsBits.ModerateMembers)
  .addSubcommand((sub) => sub.setName("list").setDescription("List pending appeals"))
  .addSubcommand((sub) =>
    sub
      .setName("approve")
      .setDescription("Mark an appeal as approved")
      .addStringOption((opt) => opt.setName("id").setDescription("Appeal id").setRequired(true)),
  )
  .addSubcommand((sub) =>
    sub
      .setName("deny")
      .setDescription("Mark an appeal as denied")
      .addStringOption((opt) => opt.setName("id").setDescription("Appeal id").setRequired(true)),
  );

export const config = { allowInDMs: false };

export async function execute(context: CommandContext): Promise<void> {
  const { interaction, getPluginAPI } = context;
  const mod = getPluginAPI("moderation");
  if (!mod || !interaction.inGuild()) {
    await interaction.reply({ content: "Moderation plugin not loaded.", ephemeral: true });
    return;
  }

  const sub = interaction.options.getSubcommand();

  if (sub === "list") {
    const pending = mod.appealService.list(interaction.guildId, AppealStatus.PENDING);
    const embed = new EmbedBuilder().setColor(ACTION_COLORS.info).setTitle("📨 Pending Appeals");
    if (pending.length === 0) {
      embed.setDescription("No pending appeals.");
    } else {
      embed.addFields(
        pending.slice(0, 25).map((appeal) => ({
          name: `${appeal.id} • ${relativeTime(appeal.createdAt)}`,
          value: `<@${appeal.userId}>: ${appeal.reason.slice(0, 900)}`,
        })),
      );
    }
    await interaction.reply({ embeds: [embed], ephemeral: true });
    return;
  }

  await interaction.deferReply({ ephemeral: true });

  const status = sub === "approve" ? AppealStatus.APPROVED : AppealStatus.DENIED;
  const result = await mod.appealService.setStatus(interaction.guildId, interaction.options.getString("id", true), status, interaction.user.id);

  if (!result.success) {
    await interaction.editReply({ embeds: [errorEmbed(result.error)] });
    return;
  }

  await interaction.editReply({ embeds: [successEmbed("Appeal Updated", `Appeal \`${result.appeal.id}\` from <@${result.appeal.userId}> is now **${status}**.`)] });
}
