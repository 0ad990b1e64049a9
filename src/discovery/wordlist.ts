import wordlists from './wordlists.json';

export const DISCOVERY_WORDLIST = 'DISCOVERY_WORDLIST';

export interface Wordlist {
    directories: readonly string[];
    files: readonly string[];
}

export const DEFAULT_WORDLIST: Wordlist = wordlists;

/** Directories first, then files. */
export function probeCandidates(wordlist: Wordlist): string[] {
    return [...wordlist.directories, ...wordlist.files];
}
