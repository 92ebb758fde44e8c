/**
 * Service wiring
 *
 * Builds every service over one set of repositories. The default instance
 * is created once per process and reused.
 */

import { TransactionRunner, transaction } from '../config/database';
import { LedgerRepository } from '../repositories/ledger-repository';
import { SeasonRepository } from '../repositories/season-repository';
import { PlayerRepository } from '../repositories/player-repository';
import { BetRepository } from '../repositories/bet-repository';
import { WeekRepository } from '../repositories/week-repository';
import { LedgerService } from './ledger-service';
import { CalculationService } from './calculation-service';
import { SeasonService } from './season-service';
import { PlayerService } from './player-service';
import { BetService } from './bet-service';
import { WeekService } from './week-service';
import { ImportService } from './import-service';
import { ScheduleSettings, loadScheduleSettings, todayIsoDate } from '../utils/contribution-schedule';

export interface Repositories {
  ledgerRepository: LedgerRepository;
  seasonRepository: SeasonRepository;
  playerRepository: PlayerRepository;
  betRepository: BetRepository;
  weekRepository: WeekRepository;
}

export interface Services {
  ledgerService: LedgerService;
  calculationService: CalculationService;
  seasonService: SeasonService;
  playerService: PlayerService;
  betService: BetService;
  weekService: WeekService;
  importService: ImportService;
}

export interface ServiceOptions {
  repositories?: Repositories;
  runTransaction?: TransactionRunner;
  schedule?: ScheduleSettings;
  today?: () => string;
}

export function createRepositories(): Repositories {
  return {
    ledgerRepository: new LedgerRepository(),
    seasonRepository: new SeasonRepository(),
    playerRepository: new PlayerRepository(),
    betRepository: new BetRepository(),
    weekRepository: new WeekRepository(),
  };
}

export function createServices(options: ServiceOptions = {}): Services {
  const repositories = options.repositories ?? createRepositories();
  const runTransaction = options.runTransaction ?? transaction;
  const schedule = options.schedule ?? loadScheduleSettings();
  const today = options.today ?? (() => todayIsoDate());

  const { ledgerRepository, seasonRepository, playerRepository, betRepository, weekRepository } =
    repositories;

  const ledgerService = new LedgerService(
    ledgerRepository,
    playerRepository,
    seasonRepository,
    betRepository,
    weekRepository,
    runTransaction
  );
  const weekService = new WeekService(
    weekRepository,
    seasonRepository,
    playerRepository,
    runTransaction
  );

  return {
    ledgerService,
    calculationService: new CalculationService(
      ledgerRepository,
      playerRepository,
      seasonRepository,
      schedule,
      today
    ),
    seasonService: new SeasonService(seasonRepository, runTransaction),
    playerService: new PlayerService(playerRepository, seasonRepository, runTransaction, today),
    betService: new BetService(
      betRepository,
      ledgerRepository,
      seasonRepository,
      playerRepository,
      weekRepository,
      ledgerService,
      runTransaction,
      today
    ),
    weekService,
    importService: new ImportService(
      ledgerService,
      weekService,
      betRepository,
      playerRepository,
      seasonRepository,
      weekRepository,
      runTransaction
    ),
  };
}

let services: Services | null = null;

/**
 * Shared services backed by the database pool
 */
export function getServices(): Services {
  if (!services) {
    services = createServices();
  }
  return services;
}
