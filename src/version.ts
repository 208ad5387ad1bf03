export const NAME = 'healthpulse';
export const VERSION = '0.1.0';
