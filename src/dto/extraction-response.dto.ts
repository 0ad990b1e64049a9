import { ApiProperty } from '@nestjs/swagger';

abstract class ExtractionResponseDto {
    @ApiProperty({ example: true })
    ok!: true;

    @ApiProperty({ description: 'URL after redirects', example: 'https://example.com/' })
    url!: string;
}

export class TitleResponseDto extends ExtractionResponseDto {
    @ApiProperty({ type: String, nullable: true, example: 'Example Domain' })
    title!: string | null;
}

export class LinksResponseDto extends ExtractionResponseDto {
    @ApiProperty({ type: [String], description: 'Absolute links, deduplicated and sorted' })
    links!: string[];
}

export class ImagesResponseDto extends ExtractionResponseDto {
    @ApiProperty({ type: [String], description: 'Absolute image sources, deduplicated and sorted' })
    images!: string[];
}

export class MetaResponseDto extends ExtractionResponseDto {
    @ApiProperty({ type: String, nullable: true, example: 'An example page.' })
    description!: string | null;
}

export class TextResponseDto extends ExtractionResponseDto {
    @ApiProperty({ description: 'Visible text, whitespace collapsed and truncated' })
    text!: string;

    @ApiProperty({ example: 500 })
    maxChars!: number;
}
