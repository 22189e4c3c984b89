export * from './models';
export * from './suggestion_generator';
export * from './suggestion_service';
export * from './feedback_loop';
