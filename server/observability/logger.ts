import winston from 'winston';
import WinstonCloudWatch from 'winston-cloudwatch';

interface CloudWatchConfig {
  logGroupName: string;
  logStreamName: string;
  awsRegion: string;
  awsOptions: {
    credentials: {
      accessKeyId: string;
      secretAccessKey: string;
    };
  };
}

const transports: winston.transport[] = [
  new winston.transports.Console({
    silent: process.env.NODE_ENV === 'test' || process.env.TEST_MODE === 'true',
  }),
];

const accessKeyId = process.env.AWS_ACCESS_KEY_ID;
const secretAccessKey = process.env.AWS_SECRET_ACCESS_KEY;

if (accessKeyId && secretAccessKey) {
  const cloudWatchConfig: CloudWatchConfig = {
    logGroupName: process.env.CLOUDWATCH_LOG_GROUP || 'slack-mcp-session-bridge',
    logStreamName: 'session-events',
    awsRegion: process.env.AWS_REGION || 'us-east-1',
    awsOptions: {
      credentials: { accessKeyId, secretAccessKey },
    },
  };
  transports.push(new WinstonCloudWatch(cloudWatchConfig));
}

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.json(),
  ),
  transports,
});

/**
 * Describe a secret for log output without revealing it.
 * Only a short prefix, the length and the last four characters are kept.
 */
export function getTokenLogInfo(token: string | undefined, prefix: string = 'token'): Record<string, unknown> {
  const key = prefix.toLowerCase();
  if (!token) {
    return { [`${key}Available`]: false };
  }

  return {
    [`${key}Available`]: true,
    [`${key}Prefix`]: token.substring(0, 8) + '...',
    [`${key}Length`]: token.length,
    [`${key}LastFour`]: '...' + token.slice(-4),
  };
}
