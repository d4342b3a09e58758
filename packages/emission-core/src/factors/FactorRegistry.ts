import { FactorTable } from "./FactorTable.js";

/**
 * Holder for long-running hosts (HTTP server) that may reload factors.
 * A reload is one reference swap; a calculation reads current() once and
 * keeps that table until it returns.
 */
export class FactorRegistry {
    private table: FactorTable;
    private _generation = 1;

    constructor(initial: FactorTable) {
        this.table = initial;
    }

    current(): FactorTable {
        return this.table;
    }

    get generation(): number {
        return this._generation;
    }

    replace(next: FactorTable): number {
        this.table = next;
        this._generation += 1;
        return this._generation;
    }
}
