/**
 * End-user auth routes
 * Routes: /auth/*
 */

import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Post,
  Req,
  Res,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { RouteAuth } from '../authorization/route-auth.decorator';
import { CurrentIdentity } from '../authorization/current-identity.decorator';
import { IdentityContext } from '../authorization/identity-context';
import { AuthService } from './auth.service';
import { DeviceCookieService } from './device-cookie.service';
import { LoginDto } from './dto/login.dto';
import { LogoutDto, MessageResponseDto, RefreshDto, TokenResponseDto } from './dto/token.dto';
import { ChangePasswordDto } from './dto/password.dto';
import { MeResponseDto } from './dto/me.dto';

@Controller('auth')
export class AuthController {
  constructor(
    private authService: AuthService,
    private deviceCookies: DeviceCookieService,
  ) {}

  /**
   * POST /auth/login
   * Sets the device cookie when absent
   */
  @Post('login')
  @HttpCode(HttpStatus.OK)
  async login(
    @Body() dto: LoginDto,
    @Req() req: Request,
    @Res({ passthrough: true }) res: Response,
  ): Promise<TokenResponseDto> {
    const deviceId = this.deviceCookies.ensure(req, res);
    return this.authService.login(
      'app',
      dto.identifier,
      dto.password,
      deviceId,
      this.deviceCookies.context(req),
    );
  }

  @Post('refresh')
  @HttpCode(HttpStatus.OK)
  async refresh(@Body() dto: RefreshDto, @Req() req: Request): Promise<TokenResponseDto> {
    return this.authService.refresh('app', dto.refresh_token, this.deviceCookies.context(req));
  }

  @Post('logout')
  @HttpCode(HttpStatus.OK)
  async logout(@Body() dto: LogoutDto): Promise<MessageResponseDto> {
    await this.authService.logout('app', dto.access_token, dto.refresh_token);
    return { message: 'Logged out successfully' };
  }

  @Get('me')
  @RouteAuth({ audience: 'app' })
  async me(@CurrentIdentity() identity: IdentityContext): Promise<MeResponseDto> {
    return this.authService.me(identity);
  }

  /**
   * POST /auth/password
   * Ends every session of the user
   */
  @Post('password')
  @HttpCode(HttpStatus.OK)
  @RouteAuth({ audience: 'app' })
  async changePassword(
    @CurrentIdentity() identity: IdentityContext,
    @Body() dto: ChangePasswordDto,
  ): Promise<MessageResponseDto> {
    await this.authService.changePassword(identity, dto.current_password, dto.new_password);
    return { message: 'Password changed' };
  }
}
