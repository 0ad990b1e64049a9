import { ApiProperty } from '@nestjs/swagger';

export class AnalysisResponseDto {
    @ApiProperty({ example: true })
    ok!: true;

    @ApiProperty({ description: 'URL after redirects', example: 'https://example.com/files/' })
    url!: string;

    @ApiProperty({ example: 200 })
    status!: number;

    @ApiProperty({ description: 'Whether the page looks like a directory listing', example: true })
    isListing!: boolean;

    @ApiProperty({ description: 'Server header, empty when absent', example: 'nginx' })
    server!: string;

    @ApiProperty({ type: [String], description: 'First 20 non-file links, in document order' })
    links!: string[];

    @ApiProperty({ type: [String], description: 'First 20 file links, in document order' })
    files!: string[];

    @ApiProperty({ example: 4 })
    linkCount!: number;

    @ApiProperty({ example: 12 })
    fileCount!: number;
}
