import { ExchangeCredentials } from '../exchange.interface';

export interface CredentialsValidation {
  isValid: boolean;
  errors: string[];
}

/**
 * Validate API credentials before any private call is attempted.
 * @param requirePassphrase - Exchanges such as Bitget sign with a third secret
 */
export function validateCredentials(
  credentials: ExchangeCredentials,
  requirePassphrase = false,
): CredentialsValidation {
  const errors: string[] = [];
  const { apiKey, secretKey, passphrase } = credentials;

  if (!apiKey || apiKey.trim() === '') {
    errors.push('API key is required');
  }

  if (!secretKey || secretKey.trim() === '') {
    errors.push('Secret key is required');
  }

  if (apiKey && apiKey.length < 10) {
    errors.push('API key appears to be too short');
  }

  if (secretKey && secretKey.length < 10) {
    errors.push('Secret key appears to be too short');
  }

  if (requirePassphrase && (!passphrase || passphrase.trim() === '')) {
    errors.push('Passphrase is required');
  }

  return {
    isValid: errors.length === 0,
    errors,
  };
}

/** Key prefix safe to print in logs. */
export const maskKey = (apiKey: string): string =>
  apiKey ? `${apiKey.substring(0, 6)}...` : 'Not configured';
