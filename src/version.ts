export const NAME = 'cadence';
export const VERSION = '0.4.0';
