export const NAME = 'rightsizer';
export const VERSION = '0.4.0';
