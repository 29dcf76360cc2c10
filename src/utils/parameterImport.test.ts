import {
    detectDelimiter,
    isHeaderLine,
    normalizeDataType,
    normalizeRequired,
    parseParameterText
} from './parameterImport';

describe('parseParameterText', () => {
    it('maps a tab separated row onto the fixed column order', () => {
        const rows = parseParameterText('id\tName\tvarchar\t50\t是\tdesc\tex1', { paramType: 'input' });

        expect(rows).toEqual([{
            param_type: 'input',
            field_name: 'id',
            name: 'Name',
            data_type: 'varchar',
            default_value: '50',
            required: true,
            description: 'desc',
            example: 'ex1',
            order_index: 0
        }]);
    });

    it('skips a Chinese header line', () => {
        const text = '字段名\t名称\t类型\npatient_id\t患者ID\tint';
        const rows = parseParameterText(text, { paramType: 'input' });

        expect(rows).toHaveLength(1);
        expect(rows[0].field_name).toBe('patient_id');
        expect(rows[0].data_type).toBe('int');
    });

    it('skips a header whose cells only contain the keywords', () => {
        const text = '字段名(英文)\t中文名称\t数据类型(长度)\npatient_id\t患者ID\tint';
        const rows = parseParameterText(text, { paramType: 'input' });

        expect(rows.map(row => row.field_name)).toEqual(['patient_id']);
        expect(rows[0].order_index).toBe(0);
    });

    it('skips an English header line', () => {
        const text = 'field,name,type\nvisit_no,Visit number,string';
        const rows = parseParameterText(text, { paramType: 'output' });

        expect(rows.map(row => row.field_name)).toEqual(['visit_no']);
    });

    it('fills missing trailing columns with empty strings', () => {
        const [row] = parseParameterText('code,Code', { paramType: 'input' });

        expect(row.data_type).toBe('string');
        expect(row.default_value).toBe('');
        expect(row.required).toBe(false);
        expect(row.description).toBe('');
        expect(row.example).toBe('');
    });

    it('drops rows without field name and name and ignores blank lines', () => {
        const text = 'a|A|int\n\n  \n||\r\nb|B|bool';
        const rows = parseParameterText(text, { paramType: 'input' });

        expect(rows.map(row => row.field_name)).toEqual(['a', 'b']);
        expect(rows.map(row => row.order_index)).toEqual([0, 1]);
    });

    it('continues order_index from the start index', () => {
        const rows = parseParameterText('x\tX\ny\tY', { paramType: 'output', startIndex: 4 });

        expect(rows.map(row => row.order_index)).toEqual([4, 5]);
    });

    it('never marks output parameters as required', () => {
        const [row] = parseParameterText('id\tID\tint\t\tyes', { paramType: 'output' });

        expect(row.required).toBe(false);
    });

    it('splits markdown table rows', () => {
        const rows = parseParameterText('| dept_code | 科室编码 | varchar(20) |', { paramType: 'input' });

        expect(rows).toHaveLength(1);
        expect(rows[0].field_name).toBe('dept_code');
        expect(rows[0].name).toBe('科室编码');
        expect(rows[0].data_type).toBe('varchar');
    });

    it('returns nothing for empty input', () => {
        expect(parseParameterText('\n\n', { paramType: 'input' })).toEqual([]);
    });
});

describe('detectDelimiter', () => {
    it('picks the delimiter with the most columns', () => {
        expect(detectDelimiter('a,b,c\td')).toBe(',');
        expect(detectDelimiter('a  b  c')).toBe('double-space');
        expect(detectDelimiter('a|b')).toBe('|');
    });

    it('prefers tab on a tie and defaults to tab', () => {
        expect(detectDelimiter('a\tb,c')).toBe('\t');
        expect(detectDelimiter('single')).toBe('\t');
    });
});

describe('isHeaderLine', () => {
    it('matches lines that contain a header keyword', () => {
        expect(isHeaderLine('Field Name\tx')).toBe(true);
        expect(isHeaderLine('PARAM,DATA_TYPE')).toBe(true);
        expect(isHeaderLine('字段名(英文)\t中文名称\t数据类型(长度)')).toBe(true);
        expect(isHeaderLine('参数\t说明')).toBe(true);
    });

    it('does not treat a data row with a Name value as a header', () => {
        expect(isHeaderLine('id\tName\tvarchar\t50\t是\tdesc\tex1')).toBe(false);
        expect(isHeaderLine('dept_code\t科室编码\tvarchar(20)')).toBe(false);
    });
});

describe('normalizeDataType', () => {
    it.each([
        ['NVARCHAR(100)', 'varchar'],
        ['text', 'string'],
        ['整数', 'int'],
        ['Decimal(10,2)', 'float'],
        ['bool', 'boolean'],
        ['timestamp', 'datetime'],
        ['日期', 'date'],
        ['json', 'object'],
        ['list', 'array'],
        ['', 'string'],
        ['blob', 'string']
    ])('maps %s to %s', (raw, expected) => {
        expect(normalizeDataType(raw)).toBe(expected);
    });
});

describe('normalizeRequired', () => {
    it('accepts the truthy markers case-insensitively', () => {
        for (const marker of ['是', 'YES', 'True', '1', 'y', '必填']) {
            expect(normalizeRequired(marker, 'input')).toBe(true);
        }
        expect(normalizeRequired('否', 'input')).toBe(false);
        expect(normalizeRequired('', 'input')).toBe(false);
    });
});
