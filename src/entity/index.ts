export * from './replicated-enemy';
export * from './pool';
