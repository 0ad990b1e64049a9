import { ApiProperty } from '@nestjs/swagger';
import { ViewPageDto } from './view-page.dto';

export class ProbeResultDto {
    @ApiProperty({ example: 'https://example.com/admin' })
    url!: string;

    @ApiProperty({ example: 403 })
    status!: number;

    @ApiProperty({ description: 'Content-Type header, empty when absent', example: 'text/html' })
    contentType!: string;
}

export class DiscoveryResponseDto {
    @ApiProperty({ example: 'https://example.com' })
    base!: string;

    @ApiProperty({ description: 'Number of wordlist paths probed', example: 49 })
    checked!: number;

    @ApiProperty({ example: 2 })
    totalFound!: number;

    @ApiProperty({ type: [ProbeResultDto], description: 'Accepted probes, in wordlist order' })
    found!: ProbeResultDto[];

    @ApiProperty({ type: ViewPageDto, description: 'First page of the paginated view' })
    view!: ViewPageDto;
}
