import {
  Body,
  Controller,
  HttpCode,
  HttpException,
  HttpStatus,
  Post,
} from '@nestjs/common';
import {
  ApiBadRequestResponse,
  ApiConflictResponse,
  ApiInternalServerErrorResponse,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
} from '@nestjs/swagger';
import {
  OtpResponseDto,
  ResendOtpRequestDto,
  SendOtpRequestDto,
  VerifyOtpRequestDto,
} from './dto/otp.dto';
import { OTP_ERROR_STATUS } from './otp.errors';
import { OtpService } from './otp.service';
import type { OtpResult, OtpSuccess } from './types/otp.types';

@ApiTags('OTP Operations')
@Controller()
export class OtpController {
  constructor(private readonly otp: OtpService) {}

  @Post('otp_send')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Sends a WhatsApp OTP to the phone number' })
  @ApiOkResponse({ type: OtpResponseDto })
  @ApiBadRequestResponse({ description: 'Invalid phone number format' })
  @ApiConflictResponse({ description: 'An unexpired OTP already exists' })
  @ApiInternalServerErrorResponse({ description: 'Delivery or storage failure' })
  async send(@Body() body: SendOtpRequestDto): Promise<OtpSuccess> {
    return this.unwrap(await this.otp.send(body.phone_number));
  }

  @Post('otp_resend')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Issues a new OTP, superseding the previous one' })
  @ApiOkResponse({ type: OtpResponseDto })
  @ApiBadRequestResponse({ description: 'Invalid phone number format' })
  @ApiInternalServerErrorResponse({ description: 'Delivery or storage failure' })
  async resend(@Body() body: ResendOtpRequestDto): Promise<OtpSuccess> {
    return this.unwrap(await this.otp.resend(body.phone_number));
  }

  @Post('otp_verify')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Verifies the OTP and marks it as used' })
  @ApiOkResponse({ type: OtpResponseDto })
  @ApiBadRequestResponse({ description: 'Invalid phone number, code format or code' })
  @ApiNotFoundResponse({ description: 'OTP not found or expired' })
  async verify(@Body() body: VerifyOtpRequestDto): Promise<OtpSuccess> {
    return this.unwrap(await this.otp.verify(body.phone_number, body.otp));
  }

  private unwrap(result: OtpResult): OtpSuccess {
    if (result.success) {
      return result;
    }

    throw new HttpException(
      {
        success: false,
        message: result.message,
        data: result.data,
      },
      OTP_ERROR_STATUS[result.error],
    );
  }
}
