export const NAME = 'agent-replay';
export const VERSION = '0.1.0';
