export const NAME = 'gpufanctl';
export const VERSION = '0.1.0';
