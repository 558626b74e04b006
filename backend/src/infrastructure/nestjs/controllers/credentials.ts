import { BadRequestException } from '@nestjs/common';
import { GitHubCredentials } from '../../../domain';

export const GITHUB_TOKEN_HEADER = 'x-github-token';

/** Header token first, then the server's configured token. */
export function optionalCredentials(headerToken: string | undefined, fallback: string | null): GitHubCredentials | null {
  const token = headerToken?.trim() || fallback;
  return token ? { token } : null;
}

export function requireCredentials(headerToken: string | undefined, fallback: string | null): GitHubCredentials {
  const credentials = optionalCredentials(headerToken, fallback);
  if (!credentials) {
    throw new BadRequestException('A GitHub token is required (X-GitHub-Token header or GITHUB_TOKEN)');
  }
  return credentials;
}
