import {Auth, google} from 'googleapis';
import type {AppConfig} from '../config.js';

/**
 * OAuth2 client for the single mailbox and calendar this service syncs.
 * googleapis refreshes the access token from the refresh token as needed.
 */
export function createOAuth2Client(
  googleConfig: AppConfig['google'],
): Auth.OAuth2Client {
  if (!googleConfig.refreshToken) {
    throw new Error(
      'GOOGLE_REFRESH_TOKEN is missing. Authorize the account and set the refresh token.',
    );
  }

  const client = new google.auth.OAuth2(
    googleConfig.clientId,
    googleConfig.clientSecret,
    googleConfig.redirectUri || undefined,
  );
  client.setCredentials({refresh_token: googleConfig.refreshToken});

  client.on('tokens', tokens => {
    console.log(`[OAuth Client] [${new Date().toISOString()}] Access token refreshed`, {
      expiryDate: tokens.expiry_date
        ? new Date(tokens.expiry_date).toISOString()
        : 'unknown',
      scope: tokens.scope,
    });
  });

  return client;
}
