/**
 * /automod subcommand router
 */

import type { CommandContext } from "../../../../src/core/CommandManager.js";
import { handleView } from "./view.js";
import { handleSet } from "./set.js";
import { handleBlockWord } from "./blockword.js";
import { handleLinkWhitelist } from "./linkwhitelist.js";
import { handleToggle } from "./toggle.js";

export async function execute(context: CommandContext): Promise<void> {
  const { interaction } = context;
  const sub = interaction.options.getSubcommand();

  switch (sub) {
    case "view":
      await handleView(context);
      break;
    case "set":
      await handleSet(context);
      break;
    case "blockword":
      await handleBlockWord(context);
      break;
    case "linkwhitelist":
      await handleLinkWhitelist(context);
      break;
    case "toggle":
      await handleToggle(context);
      break;
    default:
      await interaction.reply({ content: "Unknown subcommand.", ephemeral: true });
  }
}
