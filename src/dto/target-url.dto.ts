import { ApiProperty } from '@nestjs/swagger';
import { IsUrl } from 'class-validator';

export class TargetUrlDto {
  @ApiProperty({
    description: 'Absolute HTTP/HTTPS URL of the target page (protocol required)',
    example: 'https://example.com/files/',
  })
  @IsUrl({
    protocols: ['http', 'https'],
    require_protocol: true,
    require_valid_protocol: true,
    require_tld: false
  }, {
    message: 'url must be a valid HTTP or HTTPS URL with protocol (e.g., https://example.com)'
  })
  url!: string;
}
