import {
  Body,
  Controller,
  Get,
  Headers,
  HttpCode,
  HttpStatus,
  Post,
  Req,
} from '@nestjs/common';
import type { FastifyRequest } from 'fastify';
import { AuthService } from './auth.service';
import { RegisterDto } from './dto/register.dto';
import { LoginDto } from './dto/login.dto';
import type { TokenContext } from './interfaces/auth-result.interface';
import { Public } from '../common/decorators/public.decorator';
import { ThrottleAuth } from '../common/decorators/throttle.decorator';

@Controller('api')
export class AuthController {
  constructor(private readonly authService: AuthService) { }

  @Public()
  @ThrottleAuth()
  @Post('register')
  async register(@Body() dto: RegisterDto, @Req() request: FastifyRequest) {
    return this.authService.register(dto, this.buildContextFromRequest(request));
  }

  @Public()
  @ThrottleAuth()
  @Post('login')
  @HttpCode(HttpStatus.OK)
  async login(@Body() dto: LoginDto, @Req() request: FastifyRequest) {
    return this.authService.login(dto, this.buildContextFromRequest(request));
  }

  @Public()
  @ThrottleAuth()
  @Post('admin-login')
  @HttpCode(HttpStatus.OK)
  async adminLogin(@Body() dto: LoginDto, @Req() request: FastifyRequest) {
    return this.authService.adminLogin(dto, this.buildContextFromRequest(request));
  }

  @Public()
  @Get('check-auth')
  async checkAuth(@Headers('authorization') authorization?: string) {
    const [scheme, token] = authorization?.trim().split(/\s+/) ?? [];
    return this.authService.checkAuth(scheme?.toLowerCase() === 'bearer' ? token : null);
  }

  private buildContextFromRequest(request: FastifyRequest): TokenContext {
    const xff = request.headers['x-forwarded-for'];
    const ua = request.headers['user-agent'];

    const xffValue = Array.isArray(xff) ? xff[0] : xff;
    const ipFromHeader = typeof xffValue === 'string'
      ? xffValue.split(',')[0]?.trim()
      : undefined;

    return {
      ip: ipFromHeader ?? request.ip,
      userAgent: ua,
    };
  }
}
