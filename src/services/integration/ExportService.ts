import * as ExcelJS from 'exceljs';
import { Inject, Service } from 'typedi';
import { DataSource } from 'typeorm';
import { Dictionary, Interface } from '../../entities';
import { DATA_SOURCE } from '../../lib/container';
import { logger } from '../../lib/logger';
import type { InterfaceStatus, InterfaceType, ParamType } from '../../types/domain.types';
import { DictionaryService } from '../persistence/DictionaryService';
import { InterfaceService } from '../persistence/InterfaceService';

const log = logger.child('Export');

const MAX_COLUMN_WIDTH = 50;

export interface ExportedParameter {
    name: string;
    field_name: string;
    data_type: string;
    param_type: ParamType;
    required: boolean;
    default_value: string | null;
    description: string | null;
    example: string | null;
    order_index: number;
}

export interface ExportedInterface {
    code: string;
    name: string;
    description: string | null;
    interface_type: InterfaceType;
    url: string | null;
    method: string | null;
    category: string | null;
    tags: string | null;
    status: InterfaceStatus;
    input_example: string | null;
    output_example: string | null;
    view_definition: string | null;
    notes: string | null;
    parameters: ExportedParameter[];
}

export interface ExportedDictionary {
    code: string;
    name: string;
    description: string | null;
    values: Array<{ key: string; value: string; description: string | null; order_index: number }>;
}

export interface ExportBundle {
    interfaces: ExportedInterface[];
    dictionaries: ExportedDictionary[];
    export_time: string;
}

/** his_interfaces_20240501_083000.json */
export function exportFilename(extension: 'json' | 'xlsx', now: Date = new Date()): string {
    const pad = (value: number) => String(value).padStart(2, '0');
    const stamp = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}_`
        + `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
    return `his_interfaces_${stamp}.${extension}`;
}

@Service()
export class ExportService {
    constructor(
        @Inject(DATA_SOURCE) private readonly dataSource: DataSource,
        private readonly interfaces: InterfaceService,
        private readonly dictionaries: DictionaryService
    ) { }

    async buildBundle(): Promise<ExportBundle> {
        const interfaceRows = await this.interfaces.attachParameters(
            await this.dataSource.getRepository(Interface).find({ order: { id: 'ASC' } })
        );
        const dictionaryRows = await this.dictionaries.attachValues(
            await this.dataSource.getRepository(Dictionary).find({ order: { id: 'ASC' } })
        );

        log.info('Building export', { interfaces: interfaceRows.length, dictionaries: dictionaryRows.length });

        return {
            interfaces: interfaceRows.map(row => ({
                code: row.code,
                name: row.name,
                description: row.description,
                interface_type: row.interface_type,
                url: row.url,
                method: row.method,
                category: row.category,
                tags: row.tags,
                status: row.status,
                input_example: row.input_example,
                output_example: row.output_example,
                view_definition: row.view_definition,
                notes: row.notes,
                parameters: row.parameters.map(parameter => ({
                    name: parameter.name,
                    field_name: parameter.field_name,
                    data_type: parameter.data_type,
                    param_type: parameter.param_type,
                    required: parameter.required,
                    default_value: parameter.default_value,
                    description: parameter.description,
                    example: parameter.example,
                    order_index: parameter.order_index
                }))
            })),
            dictionaries: dictionaryRows.map(row => ({
                code: row.code,
                name: row.name,
                description: row.description,
                values: row.values.map(value => ({
                    key: value.key,
                    value: value.value,
                    description: value.description,
                    order_index: value.order_index
                }))
            })),
            export_time: new Date().toISOString()
        };
    }

    async buildWorkbook(bundle?: ExportBundle): Promise<ExcelJS.Workbook> {
        const data = bundle ?? await this.buildBundle();
        const workbook = new ExcelJS.Workbook();

        const interfaceSheet = workbook.addWorksheet('接口列表');
        interfaceSheet.addRow(['接口编码', '接口名称', '接口类型', 'URL', '方法', '分类', '状态', '描述']);
        for (const row of data.interfaces) {
            interfaceSheet.addRow([
                row.code,
                row.name,
                row.interface_type === 'api' ? 'API接口' : '视图接口',
                row.url ?? '',
                row.method ?? '',
                row.category ?? '',
                row.status,
                row.description ?? ''
            ]);
        }

        const parameterSheet = workbook.addWorksheet('参数列表');
        parameterSheet.addRow(['接口编码', '参数类型', '字段名', '参数名称', '数据类型', '必填', '默认值', '描述', '示例']);
        for (const row of data.interfaces) {
            for (const parameter of row.parameters) {
                parameterSheet.addRow([
                    row.code,
                    parameter.param_type === 'input' ? '入参' : '出参',
                    parameter.field_name,
                    parameter.name,
                    parameter.data_type,
                    parameter.required ? '是' : '否',
                    parameter.default_value ?? '',
                    parameter.description ?? '',
                    parameter.example ?? ''
                ]);
            }
        }

        const dictionarySheet = workbook.addWorksheet('字典列表');
        dictionarySheet.addRow(['字典编码', '字典名称', '描述']);
        for (const row of data.dictionaries) {
            dictionarySheet.addRow([row.code, row.name, row.description ?? '']);
        }

        const valueSheet = workbook.addWorksheet('字典值');
        valueSheet.addRow(['字典编码', '键', '值', '描述']);
        for (const row of data.dictionaries) {
            for (const value of row.values) {
                valueSheet.addRow([row.code, value.key, value.value, value.description ?? '']);
            }
        }

        workbook.worksheets.forEach(sheet => {
            styleHeader(sheet);
            fitColumns(sheet);
        });
        return workbook;
    }

    async exportExcel(): Promise<Buffer> {
        const workbook = await this.buildWorkbook();
        return Buffer.from(await workbook.xlsx.writeBuffer());
    }
}

function styleHeader(sheet: ExcelJS.Worksheet): void {
    const header = sheet.getRow(1);
    header.eachCell(cell => {
        cell.font = { bold: true, color: { argb: 'FFFFFFFF' } };
        cell.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FF4472C4' } };
        cell.alignment = { horizontal: 'center', vertical: 'middle' };
    });
}

function fitColumns(sheet: ExcelJS.Worksheet): void {
    sheet.columns.forEach(column => {
        let longest = 0;
        column.eachCell?.({ includeEmpty: false }, cell => {
            longest = Math.max(longest, String(cell.value ?? '').length);
        });
        column.width = Math.min(longest + 2, MAX_COLUMN_WIDTH);
    });
}
