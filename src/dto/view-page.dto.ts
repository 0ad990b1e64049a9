import { ApiProperty } from '@nestjs/swagger';

export class ViewPageDto {
    @ApiProperty({
        description: 'UUID of the discovery view',
        example: '123e4567-e89b-42d3-a456-426614174000'
    })
    id!: string;

    @ApiProperty({
        description: 'Origin the discovery ran against',
        example: 'https://example.com'
    })
    base!: string;

    @ApiProperty({
        description: 'Current page, starting at 1',
        example: 1
    })
    page!: number;

    @ApiProperty({
        description: 'Number of pages in the view (at least 1)',
        example: 3
    })
    pageCount!: number;

    @ApiProperty({
        description: 'Number of paths found',
        example: 23
    })
    totalFound!: number;

    @ApiProperty({
        description: 'One line per path on this page, or "(none)"',
        example: '`/admin` → 403\n`/robots.txt` → 200'
    })
    text!: string;
}
