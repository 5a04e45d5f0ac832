export enum HorizontalAlignment {
    Left, Center, Right
}

export interface BoxBorders {
    h: string;   // horizontal |
    v: string;   // vertical -
    tr: string;  // TOP-RIGHT aka |_
    br: string;  // BOTTOM-RIGHT
    bl: string;  // BOTTOM-LEFT
    tl: string;  // TOP-LEFT aka _|
    tlb: string; // TOP-LEFT-BOTTOM aka -|
    trb: string; // TOP-RIGHT-BOTTOM aka |-
    lbr: string; // LEFT-BOTTOM-RIGHT aka T shape
    ltr: string; // LEFT-TOP-RIGHT
    x: string;   // all directions aka +
}

export interface TableFormatterOptions {
    header?: string[];
    filler?: string;
    padding?: number;
    hAlignments?: HorizontalAlignment[];
    /** Box drawing set; `null` renders cells separated by padding only */
    boxBorders?: BoxBorders | null;
}

export type TableCell = string | number | boolean;

export const BOX_BORDERS_REGULAR: BoxBorders = {
    h: '│',
    v: '─',
    tr: '└',
    br: '┌',
    bl: '┐',
    tl: '┘',
    tlb: '┤',
    trb: '├',
    lbr: '┬',
    ltr: '┴',
    x: '┼'
};

export const BOX_BORDERS_ASCII: BoxBorders = {
    h: '|',
    v: '-',
    tr: '+',
    br: '+',
    bl: '+',
    tl: '+',
    tlb: '+',
    trb: '+',
    lbr: '+',
    ltr: '+',
    x: '+'
};

/**
 * Plain text table. Rows are pushed cell by cell and the table is rendered
 * once on get(); pushing again invalidates the rendered string.
 */
export class TableFormatter {
    private readonly header: string[];
    private readonly filler: string;
    private readonly padding: number;
    private readonly hAlignments: HorizontalAlignment[];
    private readonly borders: BoxBorders | null;

    private rows: string[][] = [];
    private columnWidths: number[];
    private result: string | null = null;

    constructor(options: TableFormatterOptions = {}) {
        this.header = options.header ?? [];
        this.filler = options.filler ?? ' ';
        this.padding = options.padding ?? 1;
        this.hAlignments = options.hAlignments ?? [];
        this.borders = options.boxBorders === undefined ? BOX_BORDERS_REGULAR : options.boxBorders;
        this.columnWidths = this.header.map(col => col.length);
    }

    static header(header: string[]) {
        return new this({
            header: header
        });
    }

    get rowCount() {
        return this.rows.length;
    }

    push(...values: TableCell[]) {
        this.result = null;

        let row = values.map(value => String(value));

        for (let i = 0; i < row.length; i++)
            this.columnWidths[i] = Math.max(this.columnWidths[i] ?? 0, row[i].length);

        this.rows.push(row);
        return this;
    }

    get() {
        if (this.result !== null)
            return this.result;

        let lines: string[] = [];
        let hasHeader = this.header.length > 0;
        let lastRow = this.rows.length + (hasHeader ? 1 : 0);

        if (hasHeader) {
            if (this.borders)
                lines.push(this.makeBorderLine(0, lastRow));

            lines.push(this.makeLine(this.header));

            if (this.borders)
                lines.push(this.makeBorderLine(1, lastRow));
        }
        else if (this.borders && this.rows.length) {
            lines.push(this.makeBorderLine(0, lastRow));
        }

        this.rows.forEach((row, y) => {
            lines.push(this.makeLine(row));

            if (this.borders)
                lines.push(this.makeBorderLine((hasHeader ? 2 : 1) + y, lastRow));
        });

        this.result = lines.join('\n');
        return this.result;
    }

    private makeLine(row: string[]) {
        let line = '';

        for (let x = 0; x < this.columnWidths.length; x++)
            line += this.makeCell(row[x] ?? '', x);

        return line;
    }

    private makeCell(str: string, columnIndex: number) {
        const hBorder = this.borders ? this.borders.h : '';
        const alignment = this.hAlignments[columnIndex] ?? HorizontalAlignment.Left;

        let fillSize = this.columnWidths[columnIndex] - str.length;
        let padStr = this.filler.repeat(this.padding);
        let innerStr = str;

        if (fillSize > 0) {
            if (alignment === HorizontalAlignment.Center) {
                let fillHalf = Math.floor(fillSize / 2);
                innerStr = this.filler.repeat(fillHalf) + str + this.filler.repeat(fillSize - fillHalf);
            }
            else if (alignment === HorizontalAlignment.Right) {
                innerStr = this.filler.repeat(fillSize) + str;
            }
            else {
                innerStr = str + this.filler.repeat(fillSize);
            }
        }

        let cell = padStr + innerStr + padStr + hBorder;
        return columnIndex === 0 ? hBorder + cell : cell;
    }

    private makeBorderLine(rowIndex: number, lastRow: number) {
        let line = '';

        for (let x = 0; x < this.columnWidths.length; x++)
            line += this.makeBorderCell(x, rowIndex, lastRow);

        return line;
    }

    private makeBorderCell(columnIndex: number, rowIndex: number, lastRow: number) {
        const borders = this.borders ?? BOX_BORDERS_ASCII;
        const isFirstCol = columnIndex === 0;
        const isLastCol = columnIndex === this.columnWidths.length - 1;

        // corner to the right of the cell, and left of it for the first column
        let left: string;
        let right: string;

        if (rowIndex === 0) {
            left = borders.br;
            right = isLastCol ? borders.bl : borders.lbr;
        }
        else if (rowIndex === lastRow) {
            left = borders.tr;
            right = isLastCol ? borders.tl : borders.ltr;
        }
        else {
            left = borders.trb;
            right = isLastCol ? borders.tlb : borders.x;
        }

        let mid = borders.v.repeat(this.columnWidths[columnIndex] + this.padding * 2);
        return (isFirstCol ? left : '') + mid + right;
    }
}
