/**
 * Long-lived device cookie carried across logins
 */

import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Request, Response } from 'express';
import { v4 as uuidv4, validate as isUuid } from 'uuid';
import { ClientContext } from '@portal/common/types';

export const DEVICE_COOKIE = 'device_id';

@Injectable()
export class DeviceCookieService {
  private readonly maxAgeMs: number;
  private readonly secure: boolean;

  constructor(configService: ConfigService) {
    this.maxAgeMs =
      configService.get<number>('deviceCookieMaxAgeDays', 365) * 24 * 60 * 60 * 1000;
    this.secure = configService.get<string>('nodeEnv') === 'production';
  }

  /**
   * Existing device id when the cookie holds a UUID, otherwise a new one
   * written back to the response
   */
  ensure(req: Request, res: Response): string {
    const cookies: Record<string, unknown> = req.cookies ?? {};
    const current = cookies[DEVICE_COOKIE];
    if (typeof current === 'string' && isUuid(current)) {
      return current;
    }

    const deviceId = uuidv4();
    res.cookie(DEVICE_COOKIE, deviceId, {
      httpOnly: true,
      sameSite: 'lax',
      secure: this.secure,
      maxAge: this.maxAgeMs,
      path: '/',
    });
    return deviceId;
  }

  context(req: Request): ClientContext {
    return {
      ip: req.ip ?? null,
      userAgent: req.get('user-agent') ?? null,
    };
  }
}
