import { Module } from '@nestjs/common';
import { JwtModule } from '@nestjs/jwt';
import { PassportModule } from '@nestjs/passport';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { AuthService } from './auth.service';
import { AuthController } from './auth.controller';
import { PasswordHashService } from './services/password-hash.service';
import { AdminSeederService } from './services/admin-seeder.service';
import { UsersModule } from '../users/users.module';
import { JwtAccessStrategy } from './strategies/jwt-access.strategy';
import { CommonModule } from '../common/common.module';
import type { AuthConfig } from '../common/config/auth.config';

@Module({
  imports: [
    ConfigModule,
    UsersModule,
    CommonModule,
    PassportModule.register({ defaultStrategy: 'jwt' }),
    JwtModule.registerAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const { jwtSecret, accessTokenTtlSeconds } = configService.getOrThrow<AuthConfig>('auth');
        return {
          secret: jwtSecret,
          signOptions: {
            algorithm: 'HS256',
            expiresIn: accessTokenTtlSeconds,
          },
        };
      },
    }),
  ],
  controllers: [AuthController],
  providers: [AuthService, PasswordHashService, JwtAccessStrategy, AdminSeederService],
  exports: [AuthService, PasswordHashService],
})
export class AuthModule { }
