// Import Module decorator
import { Module } from '@nestjs/common';
import { RbacModule } from '../iam/rbac/rbac.module';
import { AuthController } from './auth.controller';
import { AuthenticatorService } from './authenticator.service';
import { JwtAuthGuard } from './jwt-auth.guard';
import { TokenService } from './token.service';

/**
 * AuthModule - session tokens and login.
 * Credential Store and PasswordHasher come from the global StorageModule.
 */
@Module({
  imports: [RbacModule],
  controllers: [AuthController],
  providers: [TokenService, AuthenticatorService, JwtAuthGuard],
  exports: [TokenService, JwtAuthGuard]
})
export class AuthModule {}
