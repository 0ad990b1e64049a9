import { Body, Controller, Get, HttpCode, HttpStatus, Logger, Param, ParseUUIDPipe, Post } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { SkipThrottle } from '@nestjs/throttler';
import { AnalysisResponseDto } from '../dto/analysis-response.dto';
import { DiscoveryResponseDto } from '../dto/discovery-response.dto';
import {
    ImagesResponseDto,
    LinksResponseDto,
    MetaResponseDto,
    TextResponseDto,
    TitleResponseDto,
} from '../dto/extraction-response.dto';
import { TargetUrlDto } from '../dto/target-url.dto';
import { TextSnippetDto } from '../dto/text-snippet.dto';
import { ViewPageDto } from '../dto/view-page.dto';
import {
    AnalysisSuccess,
    ImagesSuccess,
    LinksSuccess,
    MetaSuccess,
    TextSuccess,
    TitleSuccess,
} from '../interfaces/report.interface';
import { ViewPage } from './discovery-view.store';
import { DiscoveryResponse, ReconService } from './recon.service';

@ApiTags('Recon v1')
@Controller({ path: 'recon', version: '1' })
export class ReconController {
    private readonly logger = new Logger(ReconController.name);

    constructor(private readonly reconService: ReconService) { }

    @Post('discover')
    @HttpCode(HttpStatus.OK)
    @ApiOperation({ summary: 'Probe common paths on the origin of a URL' })
    @ApiResponse({ status: 200, type: DiscoveryResponseDto })
    @ApiResponse({ status: 400, description: 'Invalid URL' })
    @ApiResponse({ status: 429, description: 'Rate limit exceeded' })
    discover(@Body() dto: TargetUrlDto): Promise<DiscoveryResponse> {
        this.logger.log(`Received discovery request for ${dto.url}`);
        return this.reconService.discover(dto.url);
    }

    @Get('views/:id')
    @SkipThrottle()
    @ApiOperation({ summary: 'Current page of a discovery view' })
    @ApiResponse({ status: 200, type: ViewPageDto })
    @ApiResponse({ status: 404, description: 'Unknown view' })
    @ApiResponse({ status: 410, description: 'View expired' })
    showView(@Param('id', ParseUUIDPipe) id: string): ViewPage {
        return this.reconService.showView(id);
    }

    @Post('views/:id/next')
    @HttpCode(HttpStatus.OK)
    @SkipThrottle()
    @ApiOperation({ summary: 'Advance a discovery view by one page' })
    @ApiResponse({ status: 200, type: ViewPageDto })
    @ApiResponse({ status: 404, description: 'Unknown view' })
    @ApiResponse({ status: 410, description: 'View expired' })
    nextPage(@Param('id', ParseUUIDPipe) id: string): ViewPage {
        return this.reconService.nextPage(id);
    }

    @Post('views/:id/prev')
    @HttpCode(HttpStatus.OK)
    @SkipThrottle()
    @ApiOperation({ summary: 'Move a discovery view back by one page' })
    @ApiResponse({ status: 200, type: ViewPageDto })
    @ApiResponse({ status: 404, description: 'Unknown view' })
    @ApiResponse({ status: 410, description: 'View expired' })
    previousPage(@Param('id', ParseUUIDPipe) id: string): ViewPage {
        return this.reconService.previousPage(id);
    }

    @Post('analyze')
    @HttpCode(HttpStatus.OK)
    @ApiOperation({ summary: 'Detect a directory listing and classify its links' })
    @ApiResponse({ status: 200, type: AnalysisResponseDto })
    @ApiResponse({ status: 502, description: 'Target unreachable or body too large' })
    analyze(@Body() dto: TargetUrlDto): Promise<AnalysisSuccess> {
        this.logger.log(`Received analysis request for ${dto.url}`);
        return this.reconService.analyze(dto.url);
    }

    @Post('title')
    @HttpCode(HttpStatus.OK)
    @ApiOperation({ summary: 'Page title' })
    @ApiResponse({ status: 200, type: TitleResponseDto })
    title(@Body() dto: TargetUrlDto): Promise<TitleSuccess> {
        this.logger.log(`Received title request for ${dto.url}`);
        return this.reconService.title(dto.url);
    }

    @Post('links')
    @HttpCode(HttpStatus.OK)
    @ApiOperation({ summary: 'Every link on a page' })
    @ApiResponse({ status: 200, type: LinksResponseDto })
    links(@Body() dto: TargetUrlDto): Promise<LinksSuccess> {
        this.logger.log(`Received links request for ${dto.url}`);
        return this.reconService.links(dto.url);
    }

    @Post('images')
    @HttpCode(HttpStatus.OK)
    @ApiOperation({ summary: 'Every image source on a page' })
    @ApiResponse({ status: 200, type: ImagesResponseDto })
    images(@Body() dto: TargetUrlDto): Promise<ImagesSuccess> {
        this.logger.log(`Received images request for ${dto.url}`);
        return this.reconService.images(dto.url);
    }

    @Post('meta')
    @HttpCode(HttpStatus.OK)
    @ApiOperation({ summary: 'Meta description of a page' })
    @ApiResponse({ status: 200, type: MetaResponseDto })
    meta(@Body() dto: TargetUrlDto): Promise<MetaSuccess> {
        this.logger.log(`Received meta request for ${dto.url}`);
        return this.reconService.meta(dto.url);
    }

    @Post('text')
    @HttpCode(HttpStatus.OK)
    @ApiOperation({ summary: 'Visible text snippet of a page' })
    @ApiResponse({ status: 200, type: TextResponseDto })
    text(@Body() dto: TextSnippetDto): Promise<TextSuccess> {
        this.logger.log(`Received text request for ${dto.url} (maxChars: ${dto.maxChars ?? 'default'})`);
        return this.reconService.text(dto.url, dto.maxChars);
    }
}
