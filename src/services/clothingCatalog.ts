import { CATALOG_FILE_COLUMN, CATALOG_NAME_COLUMN } from '@/constants/fitting';

import type { ClothingItem, Result } from '@/types';

export type CatalogErrorReason = 'source-missing' | 'unreadable' | 'empty' | 'missing-columns';

export interface CatalogError {
    reason: CatalogErrorReason;
    message: string;
    cause?: unknown;
}

export type CatalogRowIssueReason =
    | 'column-count'
    | 'missing-name'
    | 'missing-file'
    | 'duplicate-name'
    | 'unterminated-quote';

export interface CatalogRowIssue {
    /** 1-based line number in the source text */
    line: number;
    reason: CatalogRowIssueReason;
    message: string;
}

export interface ClothingCatalog {
    items: ClothingItem[];
    skipped: CatalogRowIssue[];
}

export type CatalogParseResult = Result<ClothingCatalog, CatalogError>;

export type CatalogFetcher = (url: string) => Promise<Response>;

export interface CsvRecord {
    /** 1-based line on which the record starts */
    line: number;
    cells: string[];
    /** False when the text ended inside a quoted field */
    complete: boolean;
}

/**
 * Split CSV text into records. Quoted fields may contain commas, doubled
 * quotes and line breaks; `\r\n` and `\n` both end a record.
 */
export const tokenizeCsv = (text: string): CsvRecord[] => {
    const records: CsvRecord[] = [];
    let cells: string[] = [];
    let current = '';
    let inQuotes = false;
    let line = 1;
    let recordLine = 1;

    const endRecord = (complete: boolean) => {
        cells.push(current);
        records.push({ line: recordLine, cells, complete });
        cells = [];
        current = '';
    };

    for (let index = 0; index < text.length; index += 1) {
        const char = text[index];
        if (inQuotes) {
            if (char === '"') {
                if (text[index + 1] === '"') {
                    current += '"';
                    index += 1;
                } else {
                    inQuotes = false;
                }
            } else {
                if (char === '\n') {
                    line += 1;
                }
                current += char;
            }
            continue;
        }
        if (char === '"') {
            inQuotes = true;
        } else if (char === ',') {
            cells.push(current);
            current = '';
        } else if (char === '\n') {
            endRecord(true);
            line += 1;
            recordLine = line;
        } else if (char !== '\r' || text[index + 1] !== '\n') {
            current += char;
        }
    }

    if (inQuotes) {
        endRecord(false);
    } else if (current.length > 0 || cells.length > 0) {
        endRecord(true);
    }
    return records;
};

const isBlankRecord = (record: CsvRecord): boolean =>
    record.complete && record.cells.length === 1 && record.cells[0].trim().length === 0;

const buildImageUrl = (imageBaseUrl: string, imageFile: string): string => {
    const encoded = imageFile
        .split('/')
        .map((segment) => encodeURIComponent(segment))
        .join('/');
    return imageBaseUrl ? `${imageBaseUrl}/${encoded}` : encoded;
};

/**
 * Parse the catalog CSV. A name listed twice keeps its first position and
 * takes the image file of its last row; the overridden rows are reported.
 */
export const parseCatalog = (csv: string, imageBaseUrl: string): CatalogParseResult => {
    const records = tokenizeCsv(csv.replace(/^\uFEFF/, '')).filter(
        (record) => !isBlankRecord(record),
    );
    const [header, ...rows] = records;
    if (!header) {
        return { ok: false, error: { reason: 'empty', message: 'Clothing catalog is empty' } };
    }
    if (!header.complete) {
        return {
            ok: false,
            error: { reason: 'missing-columns', message: 'Catalog header could not be parsed' },
        };
    }
    const columns = header.cells.map((cell) => cell.trim().toLowerCase());
    const nameColumn = columns.indexOf(CATALOG_NAME_COLUMN);
    const fileColumn = columns.indexOf(CATALOG_FILE_COLUMN);
    if (nameColumn === -1 || fileColumn === -1) {
        return {
            ok: false,
            error: {
                reason: 'missing-columns',
                message: `Catalog header must contain "${CATALOG_NAME_COLUMN}" and "${CATALOG_FILE_COLUMN}"`,
            },
        };
    }

    const items: ClothingItem[] = [];
    const skipped: CatalogRowIssue[] = [];
    // name -> position in `items` and the line that currently supplies it
    const kept = new Map<string, { index: number; line: number }>();

    for (const { line, cells, complete } of rows) {
        if (!complete) {
            skipped.push({ line, reason: 'unterminated-quote', message: 'Unterminated quote' });
            continue;
        }
        if (cells.length !== columns.length) {
            skipped.push({
                line,
                reason: 'column-count',
                message: `Expected ${columns.length} columns, found ${cells.length}`,
            });
            continue;
        }
        const name = cells[nameColumn].trim();
        const imageFile = cells[fileColumn].trim();
        if (!name) {
            skipped.push({ line, reason: 'missing-name', message: 'Missing item name' });
            continue;
        }
        if (!imageFile) {
            skipped.push({ line, reason: 'missing-file', message: `No image file for "${name}"` });
            continue;
        }
        const item: ClothingItem = {
            name,
            imageFile,
            imageUrl: buildImageUrl(imageBaseUrl, imageFile),
        };
        const previous = kept.get(name);
        if (previous) {
            skipped.push({
                line: previous.line,
                reason: 'duplicate-name',
                message: `"${name}" is listed again on line ${line}`,
            });
            items[previous.index] = item;
            kept.set(name, { index: previous.index, line });
            continue;
        }
        kept.set(name, { index: items.length, line });
        items.push(item);
    }

    skipped.sort((a, b) => a.line - b.line);
    return { ok: true, value: { items, skipped } };
};

export const loadCatalog = async (
    fetcher: CatalogFetcher,
    url: string,
    imageBaseUrl: string,
): Promise<CatalogParseResult> => {
    let response: Response;
    try {
        response = await fetcher(url);
    } catch (error) {
        return {
            ok: false,
            error: {
                reason: 'source-missing',
                message: `Could not reach ${url}`,
                cause: error,
            },
        };
    }

    if (response.status === 404) {
        return {
            ok: false,
            error: { reason: 'source-missing', message: `${url} not found` },
        };
    }
    if (!response.ok) {
        return {
            ok: false,
            error: {
                reason: 'unreadable',
                message: `Loading ${url} failed with HTTP ${response.status}`,
            },
        };
    }

    let text: string;
    try {
        text = await response.text();
    } catch (error) {
        return {
            ok: false,
            error: { reason: 'unreadable', message: `Could not read ${url}`, cause: error },
        };
    }
    return parseCatalog(text, imageBaseUrl);
};
