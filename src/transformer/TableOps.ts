import type { Row, Table } from '../model/Models.ts';

// Column operations on in-memory tables. None of them mutate their input.

/**
 * Renames columns according to `mapping` (old name → new name).
 * Columns not in the mapping keep their name. If a renamed column lands on
 * an existing name, the renamed value wins.
 */
export function renameColumns(table: Table, mapping: Record<string, string>): Table {
    const rename = (name: string): string =>
        Object.hasOwn(mapping, name) ? mapping[name] : name;

    const columns: string[] = [];
    for (const column of table.columns) {
        const renamed = rename(column);
        if (!columns.includes(renamed)) columns.push(renamed);
    }

    const rows = table.rows.map((row) => {
        const out: Row = {};
        for (const [key, value] of Object.entries(row)) {
            if (Object.hasOwn(mapping, key)) continue;
            out[key] = value;
        }
        for (const [key, value] of Object.entries(row)) {
            if (Object.hasOwn(mapping, key)) out[mapping[key]] = value;
        }
        return out;
    });

    return { columns, rows };
}

/**
 * Sets `name` to `value` on every row, adding the column if it is new.
 */
export function withConstantColumn(table: Table, name: string, value: unknown): Table {
    const columns = table.columns.includes(name) ? [...table.columns] : [...table.columns, name];
    const rows = table.rows.map((row) => ({ ...row, [name]: value }));
    return { columns, rows };
}

/**
 * Projects every row to `columns`, in that order. Absent values become null.
 */
export function selectColumns(table: Table, columns: readonly string[]): Table {
    const rows = table.rows.map((row) => {
        const out: Row = {};
        for (const column of columns) {
            out[column] = Object.hasOwn(row, column) ? row[column] : null;
        }
        return out;
    });
    return { columns: [...columns], rows };
}

/**
 * Appends the rows of each table in order. Columns are the union of all
 * tables' columns, first-seen order.
 */
export function concatTables(tables: readonly Table[]): Table {
    const columns: string[] = [];
    for (const table of tables) {
        for (const column of table.columns) {
            if (!columns.includes(column)) columns.push(column);
        }
    }
    const rows = tables.flatMap((table) => table.rows.map((row) => ({ ...row })));
    return { columns, rows };
}
