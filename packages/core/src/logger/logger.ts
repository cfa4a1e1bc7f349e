import winston from 'winston';

const { combine, timestamp, colorize, printf, errors, splat } = winston.format;

const lineFormat = printf(
  ({ level, message, timestamp: time, stack, ...rest }) => {
    const extra = Object.keys(rest).length ? ` ${JSON.stringify(rest)}` : '';
    return `${time} [${level}] ${stack ?? message}${extra}`;
  }
);

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  silent: process.env.NODE_ENV === 'test',
  format: combine(
    errors({ stack: true }),
    splat(),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    colorize(),
    lineFormat
  ),
  transports: [new winston.transports.Console()],
});

export default logger;
