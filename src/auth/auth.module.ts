import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AuthController } from './auth.controller';
import { AuthService } from './auth.service';
import { OtpService } from './otp.service';
import { Session } from './entities/session.entity';
import { User } from './entities/user.entity';
import { SmsModule } from '../sms/sms.module';
import { AuthGuard } from './guards/auth.guard';
import { SessionCleanupService } from './services/session-cleanup.service';
import { TokenService } from './services/token.service';
import { SessionCacheService } from './services/session-cache.service';
import { SessionService } from './services/session.service';
import { UserService } from './services/user.service';

@Module({
  imports: [TypeOrmModule.forFeature([Session, User]), SmsModule],
  controllers: [AuthController],
  providers: [
    AuthService,
    OtpService,
    AuthGuard,
    SessionCleanupService,
    TokenService,
    SessionCacheService,
    SessionService,
    UserService,
  ],
  exports: [AuthService, AuthGuard, UserService],
})
export class AuthModule {}
