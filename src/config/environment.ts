/**
 * Environment Configuration
 * 
 * Centralized configuration management for environment variables.
 * All configuration values should be accessed through this module.
 */

export interface EnvironmentConfig {
  // Database configuration
  dbHost: string;
  dbPort: number;
  dbName: string;
  dbUser: string;
  dbPassword: string;
  dbSecretArn: string;
  dbSsl: boolean;

  // AWS configuration
  awsRegion: string;
  metricsEnabled: boolean;

  // Syndicate schedule configuration (decimal strings, parsed as money)
  weeklyContribution: string;
  bettingAllowance: string;
  budgetCycleWeeks: number;

  // Application configuration
  logLevel: string;
  nodeEnv: string;
}

/**
 * Load and validate environment configuration
 */
export function loadEnvironmentConfig(): EnvironmentConfig {
  return {
    dbHost: process.env.DB_HOST || '',
    dbPort: parseInt(process.env.DB_PORT || '5432', 10),
    dbName: process.env.DB_NAME || '',
    dbUser: process.env.DB_USER || '',
    dbPassword: process.env.DB_PASSWORD || '',
    dbSecretArn: process.env.DB_SECRET_ARN || '',
    dbSsl: process.env.DB_SSL === 'true',
    awsRegion: process.env.AWS_REGION || 'eu-west-2',
    metricsEnabled: process.env.METRICS_ENABLED === 'true',
    weeklyContribution: process.env.WEEKLY_CONTRIBUTION || '5.00',
    bettingAllowance: process.env.BETTING_ALLOWANCE || '30.00',
    budgetCycleWeeks: parseInt(process.env.BUDGET_CYCLE_WEEKS || '6', 10),
    logLevel: process.env.LOG_LEVEL || 'info',
    nodeEnv: process.env.NODE_ENV || 'development',
  };
}

/**
 * Validate that all required environment variables are set
 */
export function validateEnvironmentConfig(config: EnvironmentConfig): void {
  const requiredFields: (keyof EnvironmentConfig)[] = ['dbHost', 'dbName'];

  // Credentials come from Secrets Manager when an ARN is configured
  if (!config.dbSecretArn) {
    requiredFields.push('dbUser', 'dbPassword');
  }

  const missingFields = requiredFields.filter((field) => !config[field]);

  if (missingFields.length > 0) {
    throw new Error(
      `Missing required environment variables: ${missingFields.join(', ')}`
    );
  }

  if (!Number.isInteger(config.budgetCycleWeeks) || config.budgetCycleWeeks < 1) {
    throw new Error('BUDGET_CYCLE_WEEKS must be a positive integer');
  }
}
