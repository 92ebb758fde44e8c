/**
 * Calculation Service
 *
 * Read-only derivation of every balance, total and statistic from ledger
 * entries plus season metadata. Nothing computed here is stored.
 *
 * Queries never raise for "no data": empty scopes produce zero totals and an
 * empty roster produces a zero share. Season-scoped schedule values do need
 * the season itself and raise UnknownSeasonError without it.
 *
 * The active roster is the players whose season membership and global flag
 * are both active; it is read at query time, so the share per player always
 * reflects the current roster.
 */

import { LedgerRepository } from '../repositories/ledger-repository';
import { PlayerRepository } from '../repositories/player-repository';
import { SeasonRepository } from '../repositories/season-repository';
import { LedgerFilter } from '../models/ledger-entry';
import { Season } from '../models/season';
import { LedgerTotals, PlayerPerformance, SeasonSummary } from '../models/statistics';
import { UnknownSeasonError } from '../models/errors';
import { Money, Percentage } from '../utils/money';
import {
  bankBalance,
  foldTotals,
  netPosition,
  payoutIfCashingOut,
  profitLoss,
  profitPercentage,
  rankByProfitLoss,
  sharePerPlayer,
} from '../utils/ledger-calculation';
import {
  ScheduleSettings,
  bettingBudget,
  countMondaysSince,
  expectedContributionPerPlayer,
  expectedContributionTotal,
  loadScheduleSettings,
  todayIsoDate,
} from '../utils/contribution-schedule';

/**
 * Calculation Service
 * Provides derived ledger statistics
 */
export class CalculationService {
  constructor(
    private ledgerRepository: LedgerRepository,
    private playerRepository: PlayerRepository,
    private seasonRepository: SeasonRepository,
    private schedule: ScheduleSettings = loadScheduleSettings(),
    private today: () => string = () => todayIsoDate()
  ) {}

  /**
   * Per-kind totals within any filter
   */
  async getTotals(filter: LedgerFilter = {}): Promise<LedgerTotals> {
    const kindTotals = await this.ledgerRepository.sumByKind(filter);
    return foldTotals(kindTotals);
  }

  /**
   * Bank balance for one season, or across all seasons when omitted
   */
  async getBankBalance(seasonId?: string): Promise<Money> {
    return bankBalance(await this.getTotals({ seasonId }));
  }

  async getSeasonProfitLoss(seasonId: string): Promise<Money> {
    return profitLoss(await this.getTotals({ seasonId }));
  }

  /**
   * Profit as a percentage of net stakes, in hundredths of a percent
   */
  async getSeasonProfitPercentage(seasonId: string): Promise<Percentage> {
    return profitPercentage(await this.getTotals({ seasonId }));
  }

  async getActivePlayerCount(seasonId: string): Promise<number> {
    return this.playerRepository.countActiveInSeason(seasonId);
  }

  /**
   * Season winnings split evenly across the current active roster
   */
  async getSharePerPlayer(seasonId: string): Promise<Money> {
    const [totals, activeCount] = await Promise.all([
      this.getTotals({ seasonId }),
      this.getActivePlayerCount(seasonId),
    ]);
    return sharePerPlayer(totals.bets_won, activeCount);
  }

  async getPlayerTotals(playerId: string, seasonId?: string): Promise<LedgerTotals> {
    return this.getTotals({ playerId, seasonId });
  }

  async getPlayerContributions(playerId: string, seasonId?: string): Promise<Money> {
    return (await this.getPlayerTotals(playerId, seasonId)).paid_in;
  }

  /**
   * Stakes placed by the player, net of voided bets
   */
  async getPlayerBetsPlaced(playerId: string, seasonId?: string): Promise<Money> {
    return (await this.getPlayerTotals(playerId, seasonId)).bets_placed_net;
  }

  /**
   * Winnings from bets the player placed
   */
  async getPlayerWinnings(playerId: string, seasonId?: string): Promise<Money> {
    return (await this.getPlayerTotals(playerId, seasonId)).bets_won;
  }

  /**
   * Contributions less payouts: how much the player has in
   */
  async getPlayerNetPosition(playerId: string, seasonId?: string): Promise<Money> {
    return netPosition(await this.getPlayerTotals(playerId, seasonId));
  }

  async getPlayerProfitLoss(playerId: string, seasonId?: string): Promise<Money> {
    return profitLoss(await this.getPlayerTotals(playerId, seasonId));
  }

  /**
   * Mondays from the season start up to and including today
   */
  async getContributionWeeksElapsed(seasonId: string): Promise<number> {
    const season = await this.requireSeason(seasonId);
    return countMondaysSince(season.start_date, this.today());
  }

  /**
   * Contributions owed by the whole active roster so far
   */
  async getExpectedContributions(seasonId: string): Promise<Money> {
    const [season, activeCount] = await Promise.all([
      this.requireSeason(seasonId),
      this.getActivePlayerCount(seasonId),
    ]);

    return expectedContributionTotal(
      season.start_date,
      this.today(),
      this.schedule.weeklyContribution,
      activeCount
    );
  }

  async getExpectedContributionPerPlayer(seasonId: string): Promise<Money> {
    const season = await this.requireSeason(seasonId);
    return expectedContributionPerPlayer(
      season.start_date,
      this.today(),
      this.schedule.weeklyContribution
    );
  }

  /**
   * Betting budget granted so far less the player's net stakes
   *
   * Voided bets free their stake back into the budget.
   */
  async getPlayerBetBalance(playerId: string, seasonId: string): Promise<Money> {
    const [season, totals] = await Promise.all([
      this.requireSeason(seasonId),
      this.getPlayerTotals(playerId, seasonId),
    ]);

    return this.budgetFor(season) - totals.bets_placed_net;
  }

  /**
   * What the player would receive if cashing out now
   */
  async getPlayerPayoutAmount(playerId: string, seasonId: string): Promise<Money> {
    const [position, expectedPerPlayer, share] = await Promise.all([
      this.getPlayerNetPosition(playerId, seasonId),
      this.getExpectedContributionPerPlayer(seasonId),
      this.getSharePerPlayer(seasonId),
    ]);

    return payoutIfCashingOut(position, expectedPerPlayer, share);
  }

  /**
   * One row per active player, largest profit first
   *
   * Ties keep the roster's name order.
   */
  async getPerformanceStats(seasonId: string): Promise<PlayerPerformance[]> {
    const [season, roster, playerKindTotals] = await Promise.all([
      this.requireSeason(seasonId),
      this.playerRepository.findActiveInSeason(seasonId),
      this.ledgerRepository.sumByPlayerAndKind({ seasonId }),
    ]);

    const budget = this.budgetFor(season);

    const stats = roster.map((player): PlayerPerformance => {
      const totals = foldTotals(
        playerKindTotals.filter((total) => total.player_id === player.id)
      );

      return {
        player_id: player.id,
        player_name: player.name,
        balance: netPosition(totals),
        bets_placed: totals.bets_placed_net,
        bet_balance: budget - totals.bets_placed_net,
        won: totals.bets_won,
        profit_loss: profitLoss(totals),
      };
    });

    return rankByProfitLoss(stats);
  }

  /**
   * Everything the season dashboard shows, from one consistent set of reads
   */
  async getSeasonSummary(seasonId: string): Promise<SeasonSummary> {
    const [season, totals, activeCount] = await Promise.all([
      this.requireSeason(seasonId),
      this.getTotals({ seasonId }),
      this.getActivePlayerCount(seasonId),
    ]);

    const today = this.today();
    const perPlayer = expectedContributionPerPlayer(
      season.start_date,
      today,
      this.schedule.weeklyContribution
    );

    return {
      season_id: season.id,
      totals,
      bank_balance: bankBalance(totals),
      profit_loss: profitLoss(totals),
      profit_percentage: profitPercentage(totals),
      share_per_player: sharePerPlayer(totals.bets_won, activeCount),
      active_player_count: activeCount,
      contribution_weeks_elapsed: countMondaysSince(season.start_date, today),
      expected_contributions: perPlayer * BigInt(activeCount),
      expected_contribution_per_player: perPlayer,
    };
  }

  private budgetFor(season: Season): Money {
    return bettingBudget(
      season.start_date,
      this.today(),
      this.schedule.bettingAllowance,
      this.schedule.budgetCycleWeeks
    );
  }

  private async requireSeason(seasonId: string): Promise<Season> {
    const season = await this.seasonRepository.findById(seasonId);
    if (!season) {
      throw new UnknownSeasonError(seasonId);
    }
    return season;
  }
}
