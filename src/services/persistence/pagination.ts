import type { PageRequest, Paginated } from '../../types/domain.types';

export function pageWindow(request: PageRequest): { skip: number; take: number } {
    return { skip: (request.page - 1) * request.page_size, take: request.page_size };
}

export function toPage<T>(items: T[], total: number, request: PageRequest): Paginated<T> {
    return { total, page: request.page, page_size: request.page_size, items };
}

/** Escapes LIKE wildcards in user input; pair with ESCAPE '\' */
export function likePattern(keyword: string): string {
    return `%${keyword.replace(/[\\%_]/g, match => `\\${match}`)}%`;
}
