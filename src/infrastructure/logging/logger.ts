import { Logger } from 'tslog';

// tslogのログレベル定義: 0: silly, 1: trace, 2: debug, 3: info, 4: warn, 5: error, 6: fatal
export const logger = new Logger({
  name: 'random-coffee-bot',
  minLevel: process.env.NODE_ENV === 'production' ? 3 : 2,
  type: process.env.NODE_ENV === 'test' ? 'hidden' : 'pretty',
});
