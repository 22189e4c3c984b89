export * from './models';
export * from './session_manager';
export * from './session_stores';
