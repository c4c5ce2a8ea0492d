import 'reflect-metadata';
import { plainToInstance } from 'class-transformer';
import { IsNotEmpty, IsNumber, IsOptional, IsString, Min, validateSync } from 'class-validator';
import { isRecord, tryParseJson } from '../../../common/utils/json.util';

export class TokenResponseDto {
  @IsString()
  @IsNotEmpty()
  access_token!: string;

  @IsOptional()
  @IsNumber()
  @Min(0)
  expires_in?: number;
}

/**
 * Parse and validate a token endpoint body. Returns null for malformed payloads.
 */
export function parseTokenResponse(text: string): TokenResponseDto | null {
  const payload = tryParseJson(text);
  if (!isRecord(payload)) return null;

  const dto = plainToInstance(TokenResponseDto, payload);
  const errors = validateSync(dto);
  return errors.length === 0 ? dto : null;
}
