import { Failure } from './fetch.interface';

export interface ProbeResult {
    url: string;
    status: number;
    contentType: string;
}

export interface DiscoverySuccess {
    ok: true;
    base: string;
    checked: number;
    found: ProbeResult[];
}

export interface AnalysisSuccess {
    ok: true;
    url: string;
    status: number;
    isListing: boolean;
    server: string;
    links: string[];
    files: string[];
    linkCount: number;
    fileCount: number;
}

export interface TitleSuccess {
    ok: true;
    url: string;
    title: string | null;
}

export interface LinksSuccess {
    ok: true;
    url: string;
    links: string[];
}

export interface ImagesSuccess {
    ok: true;
    url: string;
    images: string[];
}

export interface MetaSuccess {
    ok: true;
    url: string;
    description: string | null;
}

export interface TextSuccess {
    ok: true;
    url: string;
    text: string;
    maxChars: number;
}

export type DiscoveryReport = DiscoverySuccess | Failure;
export type AnalysisReport = AnalysisSuccess | Failure;
export type TitleReport = TitleSuccess | Failure;
export type LinksReport = LinksSuccess | Failure;
export type ImagesReport = ImagesSuccess | Failure;
export type MetaReport = MetaSuccess | Failure;
export type TextReport = TextSuccess | Failure;
