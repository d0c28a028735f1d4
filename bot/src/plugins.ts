/**
 * Registered plugins. The loader orders them by their declared dependencies.
 */

import type { LoadablePlugin } from "./types/Plugin.js";
import { definePlugin } from "./core/PluginRegistry.js";
import { plugin as moderation } from "../plugins/moderation/index.js";
import { plugin as logging } from "../plugins/logging/index.js";
import { plugin as reputation } from "../plugins/reputation/index.js";

export const plugins: LoadablePlugin[] = [definePlugin(moderation), definePlugin(logging), definePlugin(reputation)];
