/**
 * Shared domain enumerations and wire shapes.
 */

export const USER_ROLES = ['admin', 'user'] as const;
export type UserRole = typeof USER_ROLES[number];

export const INTERFACE_TYPES = ['view', 'api'] as const;
export type InterfaceType = typeof INTERFACE_TYPES[number];

export const INTERFACE_STATUSES = ['active', 'inactive'] as const;
export type InterfaceStatus = typeof INTERFACE_STATUSES[number];

export const PARAM_TYPES = ['input', 'output'] as const;
export type ParamType = typeof PARAM_TYPES[number];

export const DOCUMENT_TYPES = ['pdf', 'image'] as const;
export type DocumentType = typeof DOCUMENT_TYPES[number];

export const FAQ_CONTENT_TYPES = ['attachment', 'rich_text'] as const;
export type FaqContentType = typeof FAQ_CONTENT_TYPES[number];

/** The caller attached to a request by the auth middleware */
export interface AuthUser {
    id: number;
    username: string;
    name: string;
    role: UserRole;
}

export interface Paginated<T> {
    total: number;
    page: number;
    page_size: number;
    items: T[];
}

export interface PageRequest {
    page: number;
    page_size: number;
}
