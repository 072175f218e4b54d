#!/usr/bin/env node

import { buildApplication, buildCommand, buildRouteMap, run } from "@stricli/core";
import type { CommandContext } from "@stricli/core";
import { createNowPlaying } from "./now-playing.js";
import type { ChannelFailure } from "./errors.js";
import { corpusToJson, exportCorpus } from "./output/export.js";
import { filterCorpus } from "./output/filter.js";
import { formatChannelCard, formatMatch, formatSong } from "./output/format.js";
import { logger } from "./utils/logger.js";

interface CommonFlags {
  config?: string;
  debug: boolean;
}

interface EverythingFlags extends CommonFlags {
  filter?: string;
  json: boolean;
}

interface ExportFlags extends CommonFlags {
  output: string;
}

const configFlag = {
  kind: "parsed",
  brief: "Path to configuration file",
  parse: String,
  optional: true,
} as const;

const debugFlag = {
  kind: "boolean",
  brief: "Enable debug logging",
  default: false,
} as const;

/**
 * Run a command body, turning any error into a message and exit code 1
 */
async function runAction(action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  }
}

function warnFailures(failures: ChannelFailure[]): void {
  for (const failure of failures) {
    logger.warn(`${failure.channel.name}: ${failure.error.message}`);
  }
}

const channelsCommand = buildCommand({
  docs: { brief: "List channels with their index and identifier" },
  parameters: {
    flags: { config: configFlag, debug: debugFlag },
  },
  async func(this: CommandContext, flags: CommonFlags): Promise<void> {
    await runAction(async () => {
      const client = await createNowPlaying(flags.config, flags.debug);
      const channels = await client.channels();
      const width = String(Math.max(channels.length - 1, 0)).length;
      for (const channel of channels) {
        logger.info(`${String(channel.index).padStart(width)}  ${channel.name}  (${channel.identifier})`);
      }
    });
  },
});

const currentCommand = buildCommand({
  docs: { brief: "Show the song playing now on a channel" },
  parameters: {
    positional: {
      kind: "tuple",
      parameters: [{ brief: "Channel name or index (see `channels`)", parse: String, placeholder: "channel" }],
    },
    flags: { config: configFlag, debug: debugFlag },
  },
  async func(this: CommandContext, flags: CommonFlags, channel: string): Promise<void> {
    await runAction(async () => {
      const client = await createNowPlaying(flags.config, flags.debug);
      const song = await client.currentSong(channel);
      logger.info(formatSong(song, client.config.matching.delimiter));
    });
  },
});

const previousCommand = buildCommand({
  docs: { brief: "Show the songs a channel played before the current one" },
  parameters: {
    positional: {
      kind: "tuple",
      parameters: [{ brief: "Channel name or index (see `channels`)", parse: String, placeholder: "channel" }],
    },
    flags: { config: configFlag, debug: debugFlag },
  },
  async func(this: CommandContext, flags: CommonFlags, channel: string): Promise<void> {
    await runAction(async () => {
      const client = await createNowPlaying(flags.config, flags.debug);
      const songs = await client.previousSongs(channel);
      songs.forEach((song, i) => {
        logger.info(`${i + 1}. ${formatSong(song, client.config.matching.delimiter)}`);
      });
    });
  },
});

const allCommand = buildCommand({
  docs: { brief: "Show the current song followed by previous songs" },
  parameters: {
    positional: {
      kind: "tuple",
      parameters: [{ brief: "Channel name or index (see `channels`)", parse: String, placeholder: "channel" }],
    },
    flags: { config: configFlag, debug: debugFlag },
  },
  async func(this: CommandContext, flags: CommonFlags, channel: string): Promise<void> {
    await runAction(async () => {
      const client = await createNowPlaying(flags.config, flags.debug);
      const songs = await client.allSongs(channel);
      songs.forEach((song, i) => {
        const label = i === 0 ? "now" : String(i);
        logger.info(`${label.padStart(3)}. ${formatSong(song, client.config.matching.delimiter)}`);
      });
    });
  },
});

const everythingCommand = buildCommand({
  docs: { brief: "Show songs for every channel" },
  parameters: {
    flags: {
      config: configFlag,
      debug: debugFlag,
      filter: {
        kind: "parsed",
        brief: "Only channels whose name, songs or artists contain this text",
        parse: String,
        optional: true,
      },
      json: {
        kind: "boolean",
        brief: "Print JSON instead of channel cards",
        default: false,
      },
    },
    aliases: {
      f: "filter",
    },
  },
  async func(this: CommandContext, flags: EverythingFlags): Promise<void> {
    await runAction(async () => {
      const client = await createNowPlaying(flags.config, flags.debug);
      const { corpus, failures } = await client.allChannelsData();
      const shown = filterCorpus(corpus, flags.filter ?? "");

      if (flags.json) {
        process.stdout.write(corpusToJson(shown));
      } else {
        [...shown.values()].forEach((entry, i) => {
          logger.info(formatChannelCard(entry, i, client.config.matching.delimiter));
          logger.info("");
        });
      }

      warnFailures(failures);
    });
  },
});

const identifyCommand = buildCommand({
  docs: { brief: "Find the channel playing a song (\"title by artist\" or free text)" },
  parameters: {
    positional: {
      kind: "tuple",
      parameters: [
        {
          brief: "Song to look for",
          parse: String,
          placeholder: "query",
        },
      ],
    },
    flags: { config: configFlag, debug: debugFlag },
  },
  async func(this: CommandContext, flags: CommonFlags, query: string): Promise<void> {
    await runAction(async () => {
      const client = await createNowPlaying(flags.config, flags.debug);
      const { outcome, failures } = await client.identify(query);
      warnFailures(failures);

      if (outcome.kind === "no-match") {
        logger.warn("No song data available from any channel");
        process.exitCode = 1;
        return;
      }
      logger.info(formatMatch(outcome, client.config.matching.delimiter));
    });
  },
});

const exportCommand = buildCommand({
  docs: { brief: "Write songs for every channel to a JSON file" },
  parameters: {
    flags: {
      config: configFlag,
      debug: debugFlag,
      output: {
        kind: "parsed",
        brief: "Output file path",
        parse: String,
        default: "now-playing-songs.json",
      },
    },
    aliases: {
      o: "output",
    },
  },
  async func(this: CommandContext, flags: ExportFlags): Promise<void> {
    await runAction(async () => {
      const client = await createNowPlaying(flags.config, flags.debug);
      const { corpus, failures } = await client.allChannelsData();
      await exportCorpus(corpus, flags.output);
      warnFailures(failures);
      logger.success(`Wrote ${corpus.size} channels to ${flags.output}`);
    });
  },
});

const routes = buildRouteMap({
  routes: {
    channels: channelsCommand,
    current: currentCommand,
    previous: previousCommand,
    all: allCommand,
    everything: everythingCommand,
    identify: identifyCommand,
    export: exportCommand,
  },
  docs: {
    brief: "What is playing now on every channel, and which channel is playing a song",
  },
});

const app = buildApplication(routes, {
  name: "now-playing",
  versionInfo: {
    currentVersion: "0.1.0",
  },
});

await run(app, process.argv.slice(2), { process });
