export * from './models';
export * from './lexicon';
export * from './emotion_scorer';
export * from './chaos_scorer';
export * from './risk_predictor';
export * from './retraction';
export * from './phase_machine';
export * from './predictive_analysis';
