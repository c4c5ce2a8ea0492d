import { IsString, IsOptional, IsNotEmpty, IsInt, IsNumber, Min, Max } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class ChatMessageDto {
  @ApiProperty({
    description: 'The question to answer from the loaded documents',
    example: 'What color is the sky?',
  })
  @IsString()
  @IsNotEmpty()
  message!: string;

  @ApiPropertyOptional({
    description: 'Requested model name; partial names are matched against discovered models',
    example: 'gpt-4o-mini',
  })
  @IsOptional()
  @IsString()
  model?: string;

  @ApiPropertyOptional({ description: 'Maximum tokens to generate', example: 1000 })
  @IsOptional()
  @IsInt()
  @Min(1)
  maxTokens?: number;

  @ApiPropertyOptional({ description: 'Sampling temperature', example: 0.7 })
  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(2)
  temperature?: number;

  @ApiPropertyOptional({ description: 'Number of documents to retrieve', example: 3 })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(20)
  topKDocuments?: number;
}
