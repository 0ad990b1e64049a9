import {
    BadGatewayException,
    BadRequestException,
    InternalServerErrorException,
} from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { DirectoryAnalyzerService } from '../analyzer/directory-analyzer.service';
import { DiscoveryService } from '../discovery/discovery.service';
import { FailureKind } from '../enums/failure-kind.enum';
import { PageExtractorService } from '../extractor/page-extractor.service';
import { DiscoveryViewStore, ViewPage } from './discovery-view.store';
import { ReconService } from './recon.service';

const VIEW: ViewPage = {
    id: '123e4567-e89b-42d3-a456-426614174000',
    base: 'https://example.com',
    page: 1,
    pageCount: 1,
    totalFound: 1,
    text: '`/admin` → 403',
};

describe('ReconService', () => {
    let service: ReconService;
    let mockDiscovery: { discover: jest.Mock };
    let mockAnalyzer: { analyze: jest.Mock };
    let mockExtractor: {
        title: jest.Mock;
        links: jest.Mock;
        images: jest.Mock;
        metaDescription: jest.Mock;
        textSnippet: jest.Mock;
    };
    let mockViews: { open: jest.Mock; show: jest.Mock; next: jest.Mock; previous: jest.Mock };

    beforeEach(async () => {
        mockDiscovery = { discover: jest.fn() };
        mockAnalyzer = { analyze: jest.fn() };
        mockExtractor = {
            title: jest.fn(),
            links: jest.fn(),
            images: jest.fn(),
            metaDescription: jest.fn(),
            textSnippet: jest.fn(),
        };
        mockViews = {
            open: jest.fn().mockReturnValue(VIEW),
            show: jest.fn().mockReturnValue(VIEW),
            next: jest.fn().mockReturnValue(VIEW),
            previous: jest.fn().mockReturnValue(VIEW),
        };

        const module: TestingModule = await Test.createTestingModule({
            providers: [
                ReconService,
                { provide: DiscoveryService, useValue: mockDiscovery },
                { provide: DirectoryAnalyzerService, useValue: mockAnalyzer },
                { provide: PageExtractorService, useValue: mockExtractor },
                { provide: DiscoveryViewStore, useValue: mockViews },
            ],
        }).compile();

        service = module.get<ReconService>(ReconService);
    });

    describe('discover', () => {
        it('should probe the origin and open a view over the results', async () => {
            const found = [{ url: 'https://example.com/admin', status: 403, contentType: '' }];
            mockDiscovery.discover.mockResolvedValue({ ok: true, base: 'https://example.com', checked: 49, found });

            const result = await service.discover('https://example.com/blog/post?id=1');

            expect(mockDiscovery.discover).toHaveBeenCalledWith('https://example.com');
            expect(mockViews.open).toHaveBeenCalledWith('https://example.com', found);
            expect(result).toEqual({
                base: 'https://example.com',
                checked: 49,
                totalFound: 1,
                found,
                view: VIEW,
            });
        });

        it('should reject URLs without an http origin', async () => {
            await expect(service.discover('ftp://example.com/')).rejects.toThrow(BadRequestException);
            expect(mockDiscovery.discover).not.toHaveBeenCalled();
        });

        it('should map transport failures to 502', async () => {
            mockDiscovery.discover.mockResolvedValue({
                ok: false,
                url: 'https://example.com',
                kind: FailureKind.TRANSPORT,
                error: 'HTTP error: connect ECONNREFUSED',
            });

            await expect(service.discover('https://example.com')).rejects.toThrow(BadGatewayException);
            expect(mockViews.open).not.toHaveBeenCalled();
        });
    });

    describe('analyze', () => {
        it('should return the analysis report', async () => {
            const report = {
                ok: true,
                url: 'https://example.com/files/',
                status: 200,
                isListing: true,
                server: 'nginx',
                links: [],
                files: ['https://example.com/files/a.zip'],
                linkCount: 0,
                fileCount: 1,
            };
            mockAnalyzer.analyze.mockResolvedValue(report);

            await expect(service.analyze('https://example.com/files')).resolves.toEqual(report);
        });

        it('should map resource-limit failures to 502', async () => {
            mockAnalyzer.analyze.mockResolvedValue({
                ok: false,
                url: 'https://example.com/big',
                kind: FailureKind.RESOURCE_LIMIT,
                error: 'Content too large',
                status: 200,
            });

            await expect(service.analyze('https://example.com/big')).rejects.toThrow('Content too large');
        });
    });

    describe('extraction', () => {
        it('should forward the snippet length', async () => {
            mockExtractor.textSnippet.mockResolvedValue({ ok: true, url: 'https://example.com/', text: 'Hi', maxChars: 20 });

            const result = await service.text('https://example.com/', 20);

            expect(mockExtractor.textSnippet).toHaveBeenCalledWith('https://example.com/', 20);
            expect(result.text).toBe('Hi');
        });

        it('should call the matching extractor for each operation', async () => {
            mockExtractor.title.mockResolvedValue({ ok: true, url: 'https://example.com/', title: 'Home' });
            mockExtractor.links.mockResolvedValue({ ok: true, url: 'https://example.com/', links: [] });
            mockExtractor.images.mockResolvedValue({ ok: true, url: 'https://example.com/', images: [] });
            mockExtractor.metaDescription.mockResolvedValue({ ok: true, url: 'https://example.com/', description: null });

            await expect(service.title('https://example.com/')).resolves.toEqual({ ok: true, url: 'https://example.com/', title: 'Home' });
            await expect(service.links('https://example.com/')).resolves.toEqual({ ok: true, url: 'https://example.com/', links: [] });
            await expect(service.images('https://example.com/')).resolves.toEqual({ ok: true, url: 'https://example.com/', images: [] });
            await expect(service.meta('https://example.com/')).resolves.toEqual({ ok: true, url: 'https://example.com/', description: null });
        });

        it('should map validation failures to 400', async () => {
            mockExtractor.title.mockResolvedValue({
                ok: false,
                url: 'not a url',
                kind: FailureKind.VALIDATION,
                error: 'Invalid URL: expected an absolute http or https URL',
            });

            await expect(service.title('not a url')).rejects.toThrow(BadRequestException);
        });

        it('should map unexpected failures to 500', async () => {
            mockExtractor.links.mockResolvedValue({
                ok: false,
                url: 'https://example.com/',
                kind: FailureKind.UNEXPECTED,
                error: 'boom',
            });

            await expect(service.links('https://example.com/')).rejects.toThrow(InternalServerErrorException);
        });
    });

    describe('views', () => {
        it('should delegate navigation to the view store', () => {
            expect(service.showView(VIEW.id)).toBe(VIEW);
            expect(service.nextPage(VIEW.id)).toBe(VIEW);
            expect(service.previousPage(VIEW.id)).toBe(VIEW);

            expect(mockViews.show).toHaveBeenCalledWith(VIEW.id);
            expect(mockViews.next).toHaveBeenCalledWith(VIEW.id);
            expect(mockViews.previous).toHaveBeenCalledWith(VIEW.id);
        });
    });
});
