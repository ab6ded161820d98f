import React from "react";
import Fuse from "fuse.js";
import type { AppConfig } from "../config.js";
import { startScheduler } from "../scheduler.js";
import type { ClubService } from "../service.js";
import type { Logger } from "../utils/logger.js";
import { HelpView } from "./components/HelpView.js";
import { Leaderboards } from "./components/Leaderboards.js";
import { StatusView } from "./components/StatusView.js";
import { SyncAllSummary, SyncUserSummary } from "./components/SyncSummary.js";
import { TrophySummary } from "./components/TrophySummary.js";

export interface Command {
  name: string;
  description: string;
  usage: string;
  /** Resolves to the process exit code. */
  handler: (args: string[], context: CommandContext) => Promise<number>;
}

export interface CommandContext {
  config: AppConfig;
  logger: Logger;
  /** Opens the service on first use; the caller closes it. */
  getService: () => ClubService;
  print: (node: React.ReactElement) => Promise<void>;
  /** Resolves on the first termination signal. */
  waitForShutdown: () => Promise<string>;
}

export const commands: Command[] = [
  {
    name: "sync",
    description: "Sync one user, or every active user",
    usage: "sync [userId]",
    handler: async (args, ctx) => {
      const service = ctx.getService();
      if (args.length === 0) {
        const stats = await service.syncAll();
        await ctx.print(<SyncAllSummary stats={stats} />);
        return stats.failed > 0 ? 1 : 0;
      }

      const userId = Number(args[0]);
      if (!Number.isInteger(userId) || userId <= 0) {
        await ctx.print(<HelpView entries={helpEntries()} unknown={`sync ${args[0]}`} />);
        return 1;
      }
      const result = await service.syncUser(userId);
      await ctx.print(<SyncUserSummary userId={userId} result={result} />);
      return result.success ? 0 : 1;
    },
  },
  {
    name: "trophies",
    description: "Award trophies for completed weeks",
    usage: "trophies",
    handler: async (_args, ctx) => {
      const stats = ctx.getService().calculateWeeklyTrophies();
      await ctx.print(<TrophySummary stats={stats} />);
      return stats.errors.length > 0 ? 1 : 0;
    },
  },
  {
    name: "leaderboard",
    description: "Show trophy and kudos leaderboards",
    usage: "leaderboard",
    handler: async (_args, ctx) => {
      const service = ctx.getService();
      await ctx.print(
        <Leaderboards
          trophies={service.getTrophyLeaderboard()}
          recentWinners={service.getRecentTrophyWinners()}
          weeklyKudos={service.getWeeklyKudosLeaderboard()}
          allTimeKudos={service.getAllTimeKudosLeaderboard()}
          topActivity={service.getTopKudosActivity()}
        />
      );
      return 0;
    },
  },
  {
    name: "status",
    description: "Show database and sync status",
    usage: "status",
    handler: async (_args, ctx) => {
      await ctx.print(<StatusView report={ctx.getService().status()} databasePath={ctx.config.databasePath} />);
      return 0;
    },
  },
  {
    name: "start",
    description: "Run the sync and trophy jobs on a timer",
    usage: "start",
    handler: async (_args, ctx) => {
      const scheduler = startScheduler(ctx.getService(), ctx.config.schedule, ctx.logger);
      const signal = await ctx.waitForShutdown();
      ctx.logger.info(`Received ${signal}, shutting down`);
      await scheduler.stop();
      return 0;
    },
  },
  {
    name: "help",
    description: "Show available commands",
    usage: "help",
    handler: async (_args, ctx) => {
      await ctx.print(<HelpView entries={helpEntries()} />);
      return 0;
    },
  },
];

function helpEntries() {
  return commands.map(({ usage, description }) => ({ usage, description }));
}

const fuse = new Fuse(commands, {
  keys: ["name"],
  threshold: 0.4,
  minMatchCharLength: 1,
});

export function getCommandByName(name: string): Command | undefined {
  return commands.find((cmd) => cmd.name === name);
}

export function getCommandNames(): string[] {
  return commands.map((cmd) => cmd.name);
}

/** Closest command name for a mistyped one. */
export function suggestCommand(input: string): string | undefined {
  return fuse.search(input)[0]?.item.name;
}

/** Dispatches `argv` (without node and script) and resolves to the exit code. */
export async function runCommand(argv: string[], ctx: CommandContext): Promise<number> {
  const [name = "help", ...args] = argv;
  const command = getCommandByName(name);
  if (!command) {
    await ctx.print(<HelpView entries={helpEntries()} unknown={name} suggestion={suggestCommand(name)} />);
    return 1;
  }
  return command.handler(args, ctx);
}
