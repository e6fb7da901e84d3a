import type { APIEmbed, APIEmbedField } from "discord-api-types/v10";
import { UnreachableError } from "../base/unreachable-error.mjs";
import type { TeamPosition } from "../services/riot/types.mjs";
import type { MatchSummary, ParticipantSummary } from "../services/riot/match-summary.mjs";
import { formatGold } from "../services/riot/match-summary.mjs";
import { EmbedColors } from "./colors.mjs";

interface FollowMatchEmbedData {
  playerName: string;
  summary: MatchSummary;
}

export class FollowMatchEmbed {
  private readonly data: FollowMatchEmbedData;

  constructor(data: FollowMatchEmbedData) {
    this.data = data;
  }

  get embed(): APIEmbed {
    const { playerName, summary } = this.data;
    const isVictory = summary.result === "Victory";

    return {
      title: `**${playerName}** - **${summary.gameMode}: ${summary.result} ${isVictory ? "🏆" : "❌"} - ${summary.duration}**`,
      color: isVictory ? EmbedColors.VICTORY : EmbedColors.DEFEAT,
      fields: summary.matchups.map(
        ({ role, team, enemy }): APIEmbedField => ({
          name: this.getRoleLabel(role),
          value: `${this.formatParticipant(team)}\n${this.formatParticipant(enemy)}`,
          inline: false,
        }),
      ),
      footer: { text: summary.matchId },
    };
  }

  private getRoleLabel(role: TeamPosition): string {
    switch (role) {
      case "TOP": {
        return "🔼 TOP";
      }
      case "JUNGLE": {
        return "🌲 JUNGLE";
      }
      case "MIDDLE": {
        return "🛣️ MIDDLE";
      }
      case "BOTTOM": {
        return "🔽 BOTTOM";
      }
      case "UTILITY": {
        return "🛡️ SUPPORT";
      }
      default: {
        throw new UnreachableError(role);
      }
    }
  }

  private formatParticipant({ championName, name, kills, deaths, assists, farm, gold, visionScore }: ParticipantSummary): string {
    const kda = `${kills.toString()}/${deaths.toString()}/${assists.toString()}`;

    return `${championName} **${name}**\nK/D/A: **${kda}** | CS: **${farm.toString()}** | Gold: ${formatGold(gold)} | Vision: ${visionScore.toString()}`;
  }
}
