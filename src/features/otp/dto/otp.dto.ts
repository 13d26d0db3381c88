import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString } from 'class-validator';

// Format rules (phone normalization, six digit code) are enforced by
// OtpService so that they map to the OTP error payload.

export class SendOtpRequestDto {
  @ApiProperty({ example: '+91 78888 88888' })
  @IsString()
  @IsNotEmpty()
  phone_number!: string;
}

export class ResendOtpRequestDto {
  @ApiProperty({ example: '7888888888' })
  @IsString()
  @IsNotEmpty()
  phone_number!: string;
}

export class VerifyOtpRequestDto {
  @ApiProperty({ example: '7888888888' })
  @IsString()
  @IsNotEmpty()
  phone_number!: string;

  @ApiProperty({ example: '482913', description: 'Six digit code received on WhatsApp' })
  @IsString()
  @IsNotEmpty()
  otp!: string;
}

export class OtpResponseDataDto {
  @ApiProperty({ example: '+917888888888' })
  phone_number!: string;

  @ApiProperty({ required: false, description: 'Only returned when OTP_EXPOSE_CODE=true' })
  code?: string;
}

export class OtpResponseDto {
  @ApiProperty()
  success!: boolean;

  @ApiProperty({ example: 'OTP sent successfully' })
  message!: string;

  @ApiProperty({ type: OtpResponseDataDto })
  data!: OtpResponseDataDto;
}
