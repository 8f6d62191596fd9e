/**
 * Column names and cell access for documentation rows.
 *
 * @module
 */
import type { DocumentationRow } from '../model/types.js';

export const COLUMNS = {
    fieldName: 'Field Name',
    dataType: 'Data Type',
    conditional: 'Conditional',
    remarks: 'Remarks',
    parameter: 'Parameter',
    value: 'Value',
    errorCode: 'Error Code',
    description: 'Description',
} as const;

/** Cell text, or `''` when the column is missing. */
export function cell(row: DocumentationRow, column: string): string {
    return row[column] ?? '';
}
