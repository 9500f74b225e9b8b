/**
 * Avatar presence check against a Gravatar-compatible endpoint.
 * A registered avatar is a weak signal that the address belongs to a person.
 */

import { createHash } from 'crypto';
import { AddressParts, AvatarData } from '../types/email';
import { ConnectionError } from '../utils/errors';
import { HttpClient } from '../utils/http';
import { logger } from '../utils/logger';
import { Checker } from './checker';

const log = logger.child('avatar');

export const DEFAULT_AVATAR_BASE_URL = 'https://www.gravatar.com/avatar';

/** MD5 of the image served when no avatar exists */
export const DEFAULT_IMAGE_HASH = 'd5fe5cbcc31cff5f8ac010db72eb000c';

function md5(data: string | Buffer): string {
  return createHash('md5').update(data).digest('hex');
}

/**
 * Hash of the lower-cased address without its plus-tag
 */
export function avatarHash(parts: AddressParts): string {
  return md5(`${parts.username}@${parts.hostname}`.toLowerCase());
}

export class AvatarChecker implements Checker<AvatarData> {
  private readonly baseUrl: string;

  constructor(
    private readonly http: HttpClient,
    baseUrl: string = DEFAULT_AVATAR_BASE_URL
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  /**
   * @throws ConnectionError on any error status other than 404
   */
  async check(parts: AddressParts): Promise<AvatarData> {
    const avatarUrl = `${this.baseUrl}/${avatarHash(parts)}`;
    const response = await this.http.get(`${avatarUrl}?d=404`);

    if (response.status === 404) {
      return { avatarUrl: null };
    }

    if (response.status >= 400) {
      throw new ConnectionError(`Avatar lookup returned HTTP ${response.status}`);
    }

    if (response.status === 200 && md5(response.body) !== DEFAULT_IMAGE_HASH) {
      log.debug(`Avatar found for ${parts.hostname} address`);
      return { avatarUrl };
    }

    return { avatarUrl: null };
  }
}
