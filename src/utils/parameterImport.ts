import type { ParamType } from '../types/domain.types';

/**
 * Batch parameter import
 *
 * Turns text pasted from a spreadsheet or a delimited file into parameter
 * rows. Nothing is persisted here; callers preview the rows and commit
 * them separately.
 */

export type Delimiter = '\t' | ',' | '|' | 'double-space';

export interface ParsedParameter {
    param_type: ParamType;
    field_name: string;
    name: string;
    data_type: string;
    default_value: string;
    required: boolean;
    description: string;
    example: string;
    order_index: number;
}

export interface ParseOptions {
    paramType: ParamType;
    /** order_index of the first parsed row */
    startIndex?: number;
}

// Checked in this order; on equal column counts the earlier one wins
const DELIMITERS: Delimiter[] = ['\t', ',', '|', 'double-space'];

// A first line containing any of these (lowercased) is a header. Bare "name" is
// left out: data rows such as "id\tName\tvarchar" carry it as a value.
const HEADER_KEYWORDS = ['field', 'param', 'type', '字段', '参数', '名称', '类型'];

const TYPE_SYNONYMS: Record<string, string> = {
    varchar: 'varchar',
    char: 'varchar',
    nvarchar: 'varchar',
    string: 'string',
    text: 'string',
    '字符串': 'string',
    int: 'int',
    integer: 'int',
    number: 'int',
    bigint: 'int',
    '整数': 'int',
    float: 'float',
    double: 'float',
    decimal: 'float',
    '小数': 'float',
    bool: 'boolean',
    boolean: 'boolean',
    '布尔': 'boolean',
    date: 'date',
    '日期': 'date',
    datetime: 'datetime',
    timestamp: 'datetime',
    '日期时间': 'datetime',
    object: 'object',
    json: 'object',
    '对象': 'object',
    array: 'array',
    list: 'array',
    '数组': 'array'
};

const TRUTHY_REQUIRED = new Set(['是', 'yes', 'true', '1', 'y', '必填']);

export function splitLine(line: string, delimiter: Delimiter): string[] {
    if (delimiter === 'double-space') {
        return line.trim().split(/ {2,}/);
    }

    const cells = line.split(delimiter);
    if (delimiter === '|') {
        // Markdown-style rows: | a | b |
        if (cells.length > 1 && cells[0].trim() === '') cells.shift();
        if (cells.length > 1 && cells[cells.length - 1].trim() === '') cells.pop();
    }
    return cells;
}

export function detectDelimiter(line: string): Delimiter {
    let best: Delimiter = '\t';
    let bestCount = 1;
    for (const delimiter of DELIMITERS) {
        const count = splitLine(line, delimiter).length;
        if (count > bestCount) {
            best = delimiter;
            bestCount = count;
        }
    }
    return best;
}

export function isHeaderLine(line: string): boolean {
    const text = line.toLowerCase();
    return HEADER_KEYWORDS.some(keyword => text.includes(keyword));
}

/**
 * Maps a spelled data type onto the canonical set; `varchar(50)` reads as `varchar`.
 * Unknown or empty input becomes `string`.
 */
export function normalizeDataType(raw: string): string {
    const key = raw.trim().toLowerCase().replace(/\s*\(.*\)\s*$/, '');
    return TYPE_SYNONYMS[key] ?? 'string';
}

export function normalizeRequired(raw: string, paramType: ParamType): boolean {
    if (paramType !== 'input') return false;
    return TRUTHY_REQUIRED.has(raw.trim().toLowerCase());
}

export function parseParameterText(text: string, options: ParseOptions): ParsedParameter[] {
    const { paramType, startIndex = 0 } = options;
    const lines = text.split(/\r?\n/).filter(line => line.trim() !== '');
    if (lines.length === 0) return [];

    const delimiter = detectDelimiter(lines[0]);
    const rows = lines.map(line => splitLine(line, delimiter).map(cell => cell.trim()));
    if (isHeaderLine(lines[0])) rows.shift();

    const parsed: ParsedParameter[] = [];
    for (const cells of rows) {
        const [
            fieldName = '',
            name = '',
            dataType = '',
            defaultValue = '',
            required = '',
            description = '',
            example = ''
        ] = cells;

        if (!fieldName && !name) continue;

        parsed.push({
            param_type: paramType,
            field_name: fieldName,
            name,
            data_type: normalizeDataType(dataType),
            default_value: defaultValue,
            required: normalizeRequired(required, paramType),
            description,
            example,
            order_index: startIndex + parsed.length
        });
    }
    return parsed;
}
