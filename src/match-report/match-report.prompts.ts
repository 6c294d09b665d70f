import stableStringify from 'fast-json-stable-stringify'
import type { PlayerProfile } from '../config/tennis-config'
import type { MatchReportPayload, PeriodReportPayload, ReportPrompt } from './match-report.types'

const describePlayer = (player: PlayerProfile): string =>
  `${player.handedness}-handed, ${player.backhand} backhand, ${player.level}`

const METRIC_NOTES =
  'Every derived value in "metrics" is either {"status":"ok","value":...} or ' +
  '{"status":"undefined","reason":...}. An undefined value means there was no data; never read it as zero. ' +
  'Energy in the workout record and in metrics is kJ; "presentation" already carries kcal (kJ / 4.184). ' +
  'Durations in the workout record are seconds; metrics.durationMin is minutes.'

export function buildMatchReportPrompt(payload: MatchReportPayload): ReportPrompt<MatchReportPayload> {
  const system =
    'You are a practical tennis coach and physiologist. ' +
    `You coach a ${describePlayer(payload.player)} player. ` +
    'Every statement must cite a concrete number from the data.'

  let user =
    'Analyse this tennis session. ' +
    METRIC_NOTES +
    '\n\n' +
    'Derived metrics already computed for you:\n' +
    '- trimp: duration(min) x avgHR / maxHR, the session load.\n' +
    '- hrZones: share of sampled minutes in Zone1 (<70% max HR), Zone2 (70-85%), Zone3 (>85%). ' +
    'More than 40% in Zone3 suggests overspending.\n' +
    '- hrr1: end-of-play HR minus HR one minute into recovery. >30 bpm excellent, 20-30 normal, <20 worth watching.\n' +
    '- hrCadenceRatio: per-minute HR / steps; a rising ratio means fatigue.\n' +
    '- energyPerStep: per-minute kJ / steps; a rising value means movement economy is dropping.\n' +
    '- spmHalves, energyHalves, cardiacDrift, hrRange: first vs second half, drift in bpm/min, HR max - min.\n\n'

  if (!payload.metrics.dataQuality.sufficient) {
    user +=
      `The data quality check failed (${payload.metrics.dataQuality.reasons.join(', ')}). ` +
      'Reply only with "Data insufficient" and the reason.\n\n'
  } else {
    user +=
      'Cover, in order: intensity and heart-rate profile; zones and TRIMP; movement efficiency and cadence over time; ' +
      'energy and economy; recovery (HRR1); tactical advice that uses the player profile. ' +
      'Plain, direct language, at most 500 words.\n\n'
  }

  user += `Data (JSON):\n${stableStringify(payload)}`

  return { system, user, payload }
}

export function buildPeriodReportPrompt(payload: PeriodReportPayload): ReportPrompt<PeriodReportPayload> {
  const system = 'You are a tennis conditioning analyst reviewing completed sessions. You summarise data, you do not advise.'

  const user =
    `Review the ${payload.aggregate.workoutCount} tennis sessions played on ${payload.date}. ` +
    METRIC_NOTES +
    '\n\n' +
    'Cover, citing numbers: day totals (duration, kcal, duration-weighted average HR, peak HR, distance, steps); ' +
    'TRIMP per session and how evenly load was spread; decline across sessions in average HR, cadence and ' +
    'HR/cadence ratio; energy per step across sessions; HRR1 per session; a short physiological profile. ' +
    'Give no training or tactical advice. At most 500 words.\n\n' +
    `Data (JSON):\n${stableStringify(payload)}`

  return { system, user, payload }
}
