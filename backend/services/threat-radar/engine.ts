import { v4 as uuidv4 } from 'uuid';
import { loadSettings, type AppSettings } from 'backend/config/settings';
import { ErrorLogger } from 'backend/services/error-logging/error-logger';
import { toError } from 'backend/services/error-logging/errors';
import { InMemoryErrorLoggingStorage } from 'backend/services/error-logging/storage';
import { createIncidentStorage, type IIncidentStorage, type StoredIncident } from 'backend/services/incident-storage';
import { ScrapingCoordinator, type RunResult } from 'backend/services/scraping/coordinator/scraping-coordinator';
import type { SourceDescriptor } from 'backend/services/scraping/types';
import { CandidateBuilder } from 'backend/services/threat-analysis/candidate-builder';
import { canTransition, IncidentAggregator, type TransitionResult } from 'backend/services/threat-analysis/incident-aggregator';
import { ThreatConfirmer } from 'backend/services/threat-analysis/threat-confirmer';
import type {
  Decision,
  HistoricalIncident,
  Incident,
  RiskAssessment,
  SeverityLevel,
} from 'backend/services/threat-analysis/types';
import { log } from 'backend/utils/log';

const HOUR_MS = 60 * 60 * 1000;

export interface Alert {
  id: string;
  incidentId: string;
  alertType: 'high_risk_incident';
  severity: SeverityLevel;
  title: string;
  message: string;
  riskScore: number;
  createdAt: Date;
}

export interface CycleResult {
  run: RunResult;
  evaluated: number;
  confirmed: Incident[];
  pending: Incident[];
  duplicates: number;
  alerts: Alert[];
  errors: string[];
}

export type ReviewResult =
  | { ok: true; incident: Incident; decision: Decision; alert: Alert | null }
  | { ok: false; reason: string };

export interface MonitoringStatus {
  running: boolean;
  cycles: number;
  consecutiveFailures: number;
  lastCycleAt: Date | null;
  nextRunAt: Date | null;
}

export type ContentSource = Pick<ScrapingCoordinator, 'run'>;
export type SourceLoader = () => readonly SourceDescriptor[] | Promise<readonly SourceDescriptor[]>;

export interface ThreatRadarEngineOptions {
  settings?: AppSettings;
  coordinator?: ContentSource;
  // Scraping error log for the default coordinator; each engine gets its own otherwise
  errorLogger?: ErrorLogger;
  builder?: CandidateBuilder;
  aggregator?: IncidentAggregator;
  confirmer?: ThreatConfirmer;
  storage?: IIncidentStorage;
  monitoringKeywords?: readonly string[];
  now?: () => Date;
  generateId?: () => string;
}

function alertKey(incident: Incident): string {
  return incident.title.toLowerCase().replace(/\s+/g, ' ');
}

/**
 * Runs the detection pipeline: scrape, build candidates, drop duplicates,
 * confirm, persist and raise alerts for confirmed high-risk incidents.
 */
export class ThreatRadarEngine {
  readonly errorLogger: ErrorLogger;
  private readonly settings: AppSettings;
  private readonly coordinator: ContentSource;
  private readonly builder: CandidateBuilder;
  private readonly aggregator: IncidentAggregator;
  private readonly confirmer: ThreatConfirmer;
  private readonly storage: IIncidentStorage;
  private readonly monitoringKeywords: readonly string[];
  private readonly now: () => Date;
  private readonly generateId: () => string;

  // Last alert time per incident title
  private readonly lastAlerts = new Map<string, number>();

  private monitoring = false;
  private timer: NodeJS.Timeout | null = null;
  private cycles = 0;
  private consecutiveFailures = 0;
  private lastCycleAt: Date | null = null;
  private nextRunAt: Date | null = null;

  constructor(options: ThreatRadarEngineOptions = {}) {
    this.settings = options.settings ?? loadSettings();
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? uuidv4;
    this.errorLogger = options.errorLogger ?? new ErrorLogger(new InMemoryErrorLoggingStorage());
    this.coordinator = options.coordinator ?? new ScrapingCoordinator({
      logger: this.errorLogger,
      maxWorkers: this.settings.scraperMaxWorkers,
      taskTimeoutMs: this.settings.scraperTaskTimeoutMs,
      fetchTimeoutMs: this.settings.fetchTimeoutMs,
      now: this.now,
    });
    this.builder = options.builder ?? new CandidateBuilder({ now: this.now });
    this.aggregator = options.aggregator ?? new IncidentAggregator({ now: this.now });
    this.confirmer = options.confirmer ?? new ThreatConfirmer({}, this.now);
    this.storage = options.storage ?? createIncidentStorage(this.settings.databaseUrl);
    this.monitoringKeywords = options.monitoringKeywords ?? this.settings.monitoringKeywords;
  }

  /**
   * One detection cycle. Without `historical`, recent incidents are read
   * from storage for the pattern factor.
   */
  async runCycle(sources: readonly SourceDescriptor[], historical?: readonly HistoricalIncident[]): Promise<CycleResult> {
    const run = await this.coordinator.run(sources);
    const now = this.now();
    const errors = [...run.errors];

    this.aggregator.expire(now);
    this.pruneAlerts(now);
    const history = historical ?? await this.loadHistory(now, errors);

    const result: CycleResult = { run, evaluated: 0, confirmed: [], pending: [], duplicates: 0, alerts: [], errors };

    for (const item of run.results) {
      const candidate = this.builder.build(item, this.monitoringKeywords);
      if (!candidate) {
        continue;
      }

      const added = this.aggregator.add(candidate);
      if (!added.accepted) {
        result.duplicates++;
        continue;
      }

      this.aggregator.transition(candidate.id, 'analyzing', now);
      const decision = this.confirmer.evaluate(candidate, undefined, history, now);
      result.evaluated++;

      const moved = this.aggregator.transition(candidate.id, decision.confirmed ? 'confirmed' : 'pending', now);
      if (!moved.ok) {
        errors.push(moved.reason);
        continue;
      }

      await this.persist(moved.incident, decision, errors);

      if (decision.confirmed) {
        result.confirmed.push(moved.incident);
        const alert = this.raiseAlert(moved.incident, now);
        if (alert) result.alerts.push(alert);
      } else {
        result.pending.push(moved.incident);
      }
    }

    this.lastCycleAt = now;
    log(
      `Cycle finished: ${run.itemsScraped} items, ${result.evaluated} evaluated, ${result.confirmed.length} confirmed, ` +
        `${result.pending.length} pending, ${result.duplicates} duplicates, ${result.alerts.length} alerts`,
      'engine',
    );

    return result;
  }

  /**
   * Re-evaluate a pending or investigating incident with an analyst's
   * assessment. A pending incident moves to investigating first.
   */
  async reviewIncident(id: string, assessment: RiskAssessment): Promise<ReviewResult> {
    const current = this.aggregator.get(id);
    if (!current) {
      return { ok: false, reason: `Unknown incident: ${id}` };
    }
    if (current.status !== 'pending' && current.status !== 'investigating') {
      return { ok: false, reason: `Incident ${id} is ${current.status}, only pending or investigating incidents can be reviewed` };
    }

    const now = this.now();
    const errors: string[] = [];
    if (current.status === 'pending') {
      this.aggregator.transition(id, 'investigating', now);
    }

    const history = (await this.loadHistory(now, errors)).filter((incident) => incident.id !== id);
    const decision = this.confirmer.evaluate(current, assessment, history, now);

    const moved = decision.confirmed ? this.aggregator.transition(id, 'confirmed', now) : null;
    const incident = moved?.ok ? moved.incident : this.aggregator.get(id) ?? current;

    await this.persist(incident, decision, errors);
    for (const error of errors) {
      log(error, 'engine', 'warn');
    }

    return {
      ok: true,
      incident,
      decision,
      alert: decision.confirmed ? this.raiseAlert(incident, now) : null,
    };
  }

  /**
   * The stored record is updated first; the in-memory status only moves
   * once storage has accepted it.
   */
  async dismiss(id: string): Promise<TransitionResult> {
    const now = this.now();
    const current = this.aggregator.get(id);
    if (!current) {
      return { ok: false, reason: `Unknown incident: ${id}` };
    }
    if (!canTransition(current.status, 'dismissed')) {
      return { ok: false, reason: `Cannot move incident ${id} from ${current.status} to dismissed` };
    }

    try {
      await this.storage.updateStatus(id, 'dismissed', now);
    } catch (error) {
      const reason = `Failed to record dismissal of incident ${id}: ${toError(error).message}`;
      log(reason, 'engine', 'error');
      return { ok: false, reason };
    }

    const result = this.aggregator.transition(id, 'dismissed', now);
    if (result.ok) {
      log(`Incident ${id} dismissed`, 'engine');
    }
    return result;
  }

  /**
   * Run a cycle now, then every MONITORING_INTERVAL_MS until stopped.
   * Resolves once the first cycle has finished.
   */
  async startMonitoring(loadSources: SourceLoader): Promise<void> {
    if (this.monitoring) {
      log('Monitoring already running', 'engine', 'warn');
      return;
    }

    this.monitoring = true;
    log(`Monitoring started, interval ${this.settings.monitoringIntervalMs}ms`, 'engine');

    await this.monitorOnce(loadSources);
    this.scheduleNext(loadSources);
  }

  stopMonitoring(): void {
    this.monitoring = false;
    this.nextRunAt = null;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    log('Monitoring stopped', 'engine');
  }

  monitoringStatus(): MonitoringStatus {
    return {
      running: this.monitoring,
      cycles: this.cycles,
      consecutiveFailures: this.consecutiveFailures,
      lastCycleAt: this.lastCycleAt,
      nextRunAt: this.nextRunAt,
    };
  }

  private async monitorOnce(loadSources: SourceLoader): Promise<void> {
    this.cycles++;
    try {
      const sources = await loadSources();
      await this.runCycle(sources);
      this.consecutiveFailures = 0;
    } catch (error) {
      this.consecutiveFailures++;
      log(
        `Monitoring cycle failed (${this.consecutiveFailures} in a row): ${toError(error).message}`,
        'engine',
        'error',
      );
    }
  }

  private scheduleNext(loadSources: SourceLoader): void {
    if (!this.monitoring) {
      return;
    }

    const interval = this.settings.monitoringIntervalMs;
    this.nextRunAt = new Date(this.now().getTime() + interval);
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.monitorOnce(loadSources).then(() => this.scheduleNext(loadSources));
    }, interval);
  }

  private async loadHistory(now: Date, errors: string[]): Promise<StoredIncident[]> {
    const since = new Date(now.getTime() - this.confirmer.getCriteria().recentIncidentWindowHours * HOUR_MS);
    try {
      return await this.storage.listRecent(since);
    } catch (error) {
      errors.push(`Failed to load recent incidents: ${toError(error).message}`);
      return [];
    }
  }

  private async persist(incident: Incident, decision: Decision, errors: string[]): Promise<void> {
    try {
      await this.storage.saveIncident(incident, decision);
    } catch (error) {
      const message = `Failed to persist incident ${incident.id}: ${toError(error).message}`;
      log(message, 'engine', 'error');
      errors.push(message);
    }
  }

  private raiseAlert(incident: Incident, now: Date): Alert | null {
    if (incident.riskScore < this.settings.riskAlertThreshold) {
      return null;
    }

    const key = alertKey(incident);
    const last = this.lastAlerts.get(key);
    if (last !== undefined && now.getTime() - last < this.settings.alertCooldownMs) {
      log(`Alert for "${incident.title}" suppressed by cooldown`, 'engine', 'debug');
      return null;
    }

    const alert: Alert = {
      id: this.generateId(),
      incidentId: incident.id,
      alertType: 'high_risk_incident',
      severity: incident.severity,
      title: `High Risk Incident Detected: ${incident.title}`,
      message: `${incident.severity.toUpperCase()} incident from ${incident.metadata.sourceName} ` +
        `with risk score ${incident.riskScore.toFixed(2)}/10`,
      riskScore: incident.riskScore,
      createdAt: now,
    };

    this.lastAlerts.set(key, now.getTime());
    log(`ALERT: ${alert.title}`, 'engine', 'warn');
    return alert;
  }

  private pruneAlerts(now: Date): void {
    for (const [key, at] of this.lastAlerts) {
      if (now.getTime() - at >= this.settings.alertCooldownMs) {
        this.lastAlerts.delete(key);
      }
    }
  }
}
