import {
  Controller,
  Post,
  Body,
  Get,
  Param,
  UseGuards,
  Req,
  HttpCode,
  HttpStatus,
} from '@nestjs/common';
import {
  ApiTags,
  ApiOperation,
  ApiResponse,
  ApiBearerAuth,
  ApiConsumes,
  ApiParam,
} from '@nestjs/swagger';
import { Request } from 'express';
import { AuthService, LoginResponse, RegisterResponse } from './auth.service';
import { SendOtpDto } from './dto/send-otp.dto';
import { VerifyOtpDto } from './dto/verify-otp.dto';
import { RegisterDto } from './dto/register.dto';
import { LoginDto } from './dto/login.dto';
import { AuthGuard } from './guards/auth.guard';
import { RateLimitingGuard } from '../common/guards/rate-limiting.guard';
import { CurrentUser } from './decorators/current-user.decorator';
import { AuthenticatedUser } from './interfaces/authenticated-request.interface';
import { clientInfo } from './client-info';

@Controller('auth')
@ApiTags('Authentication')
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  @Get('check-user/:mobileNo')
  @ApiOperation({ summary: 'Check whether a mobile number is registered' })
  @ApiParam({ name: 'mobileNo', example: '+919876543210' })
  @ApiResponse({ status: 200, description: '{ exists: boolean }' })
  async checkUser(@Param('mobileNo') mobileNo: string): Promise<{ exists: boolean }> {
    return await this.authService.checkUser(mobileNo);
  }

  @Post('send-otp')
  @HttpCode(HttpStatus.OK)
  @UseGuards(RateLimitingGuard)
  @ApiOperation({ summary: 'Send a registration OTP by SMS (also used to resend)' })
  @ApiResponse({ status: 200, description: 'OTP sent successfully' })
  @ApiResponse({ status: 429, description: 'Cooldown or rate limit' })
  @ApiResponse({ status: 500, description: 'SMS provider failure' })
  async sendOtp(@Body() dto: SendOtpDto, @Req() req: Request) {
    return await this.authService.sendOtp(dto.mobileNo, clientInfo(req));
  }

  @Post('verify-otp')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Verify the OTP sent to a mobile number' })
  @ApiResponse({ status: 200, description: 'OTP verified successfully' })
  @ApiResponse({ status: 400, description: 'Missing, expired or wrong OTP' })
  @ApiResponse({ status: 429, description: 'Too many attempts' })
  async verifyOtp(@Body() dto: VerifyOtpDto, @Req() req: Request) {
    return await this.authService.verifyOtp(dto.mobileNo, dto.otp, clientInfo(req));
  }

  @Post('register')
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Register a verified mobile number' })
  @ApiResponse({ status: 201, description: 'User created, access token issued' })
  @ApiResponse({ status: 400, description: 'Duplicate user or OTP failure' })
  async register(@Body() dto: RegisterDto, @Req() req: Request): Promise<RegisterResponse> {
    return await this.authService.register(dto, clientInfo(req));
  }

  @Post('login')
  @HttpCode(HttpStatus.OK)
  @UseGuards(RateLimitingGuard)
  @ApiConsumes('application/json', 'application/x-www-form-urlencoded')
  @ApiOperation({ summary: 'Log in with username or mobile number and password' })
  @ApiResponse({ status: 200, description: '{ access_token, token_type }' })
  @ApiResponse({ status: 400, description: 'Incorrect username/mobileNo or password' })
  async login(@Body() dto: LoginDto, @Req() req: Request): Promise<LoginResponse> {
    return await this.authService.login(dto.username, dto.password, clientInfo(req));
  }

  @Post('logout')
  @HttpCode(HttpStatus.OK)
  @UseGuards(AuthGuard)
  @ApiBearerAuth('bearer')
  @ApiOperation({ summary: 'Revoke the current session' })
  async logout(@CurrentUser() user: AuthenticatedUser): Promise<{ message: string }> {
    return await this.authService.logout(user);
  }
}
