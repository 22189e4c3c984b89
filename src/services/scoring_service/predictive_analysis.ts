/**
 * @file Predictive Analysis
 *
 * Short- and long-term outlook if the current pattern continues, chosen
 * from the strongest risk score. Pure and heuristic; the reply prompt
 * carries it so the model can speak to consequences without inventing them.
 */

import type { RiskScores } from './models';

export type OutlookDriver = 'danger' | 'burnout' | 'stress';

export interface PredictiveAnalysis {
  driver: OutlookDriver | null;
  shortTerm: string[];
  longTerm: string[];
  summary: string;
}

export const OUTLOOK_THRESHOLDS: Record<OutlookDriver, number> = {
  danger: 70,
  burnout: 60,
  stress: 60,
};

const OUTLOOKS: Record<OutlookDriver, { shortTerm: string[]; longTerm: string[] }> = {
  danger: {
    shortTerm: ['Immediate safety risk', 'potential for crisis escalation'],
    longTerm: ['Serious mental health consequences if help is not sought'],
  },
  burnout: {
    shortTerm: ['Continued exhaustion', 'decreased performance'],
    longTerm: ['Potential burnout', 'health issues', 'relationship strain'],
  },
  stress: {
    shortTerm: ['Increased anxiety', 'sleep issues'],
    longTerm: ['Chronic stress', 'potential health problems'],
  },
};

// Checked in this order; the first score over its threshold drives the outlook
const PRIORITY: readonly OutlookDriver[] = ['danger', 'burnout', 'stress'];

export const NO_RISK_OUTLOOK = 'No significant risks detected based on current scores.';

export function predictiveAnalysis(scores: RiskScores): PredictiveAnalysis {
  const driver = PRIORITY.find(key => scores[key] >= OUTLOOK_THRESHOLDS[key]) ?? null;
  if (!driver) {
    return { driver: null, shortTerm: [], longTerm: [], summary: NO_RISK_OUTLOOK };
  }

  const { shortTerm, longTerm } = OUTLOOKS[driver];
  return {
    driver,
    shortTerm: [...shortTerm],
    longTerm: [...longTerm],
    summary: `SHORT-TERM: ${shortTerm.join(', ')}\nLONG-TERM: ${longTerm.join(', ')}`,
  };
}
