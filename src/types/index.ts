export * from './interaction.js';
export * from './risk.js';
export * from './policy.js';
export * from './cost.js';
export * from './audit.js';
export * from './feedback.js';

export const GATEWAY_VERSION = '1.0.0';
