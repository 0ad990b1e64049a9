import { ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsInt, IsOptional, Max, Min } from 'class-validator';
import { TargetUrlDto } from './target-url.dto';

export const MAX_SNIPPET_CHARS = 4000;

export class TextSnippetDto extends TargetUrlDto {
  @ApiPropertyOptional({
    description: 'Maximum length of the returned snippet',
    minimum: 1,
    maximum: MAX_SNIPPET_CHARS,
    default: 500,
  })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(MAX_SNIPPET_CHARS)
  maxChars?: number;
}
