import { Body, Controller, Get, HttpCode, HttpStatus, Post, Req, UseGuards } from '@nestjs/common';
import type { Request } from 'express';
import { ApiBearerAuth, ApiBody, ApiOperation, ApiTags, ApiUnauthorizedResponse } from '@nestjs/swagger';
import { AuditService } from '../audit/audit.service';
import { PermissionService } from '../iam/rbac/permission.service';
import { AuthenticatorService } from './authenticator.service';
import { BearerToken } from './bearer-token';
import { CurrentUser } from './current-user.decorator';
import { LoginDto } from './dto/login.dto';
import type { AuthenticatedUser } from './interfaces/authenticated-user';
import { JwtAuthGuard } from './jwt-auth.guard';
import { TokenService } from './token.service';

/**
 * AuthController - session endpoints. Tokens are stateless: logout only
 * records the event; the client discards its token.
 */
@ApiTags('auth')
@Controller('auth')
export class AuthController {
  constructor(
    private readonly authenticator: AuthenticatorService,
    private readonly tokens: TokenService,
    private readonly permissions: PermissionService,
    private readonly audit: AuditService
  ) {}

  @Post('login')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Exchange email and password for a session token' })
  @ApiBody({ type: LoginDto })
  @ApiUnauthorizedResponse({ description: 'INVALID_CREDENTIALS' })
  async login(@Body() dto: LoginDto) {
    const result = await this.authenticator.authenticate(dto.email, dto.password);
    return {
      token: result.token,
      tokenType: 'Bearer',
      expiresAt: result.expiresAt.toISOString(),
      user: result.user
    };
  }

  @Post('refresh')
  @HttpCode(HttpStatus.OK)
  @ApiBearerAuth('bearer')
  @ApiOperation({ summary: 'Mint a new token for the identity of the presented one' })
  @ApiUnauthorizedResponse({ description: 'TOKEN_EXPIRED | TOKEN_MALFORMED | TOKEN_SIGNATURE_INVALID' })
  async refresh(@BearerToken() token: string) {
    const issued = await this.tokens.refresh(token);
    return { token: issued.token, tokenType: 'Bearer', expiresAt: issued.expiresAt.toISOString() };
  }

  @Post('logout')
  @HttpCode(HttpStatus.OK)
  @ApiBearerAuth('bearer')
  @UseGuards(JwtAuthGuard)
  logout(@CurrentUser() user: AuthenticatedUser, @Req() req: Request) {
    this.audit.record({ actorUserId: user.userId, action: 'auth.logout', targetType: 'session', requestId: req.requestId });
    return { success: true, message: 'Successfully logged out' };
  }

  @Get('me')
  @ApiBearerAuth('bearer')
  @UseGuards(JwtAuthGuard)
  me(@CurrentUser() user: AuthenticatedUser) {
    return {
      userId: user.userId,
      role: user.role,
      expiresAt: user.claims.expiresAt.toISOString(),
      permissions: this.permissions.actionsFor(user.role)
    };
  }
}
