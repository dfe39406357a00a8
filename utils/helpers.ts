/**
 * HELPERS
 * Responsibility: id generation and formatting of labels.
 * Does not contain: geometry or numbering logic.
 */
import { HoleStatus } from '../types';

const pad3 = (n: number): string => String(n).padStart(3, '0');

/**
 * Canonical grid id. Example: column 12, row 3 -> "C012R003".
 */
export const formatHoleId = (column: number, row: number): string => `C${pad3(column)}R${pad3(row)}`;

/**
 * Parses a canonical grid id back into its column and row.
 */
export const parseHoleId = (id: string): { column: number; row: number } | null => {
    const match = /^C(\d{3,})R(\d{3,})$/.exec(id);
    if (!match) return null;
    return { column: parseInt(match[1], 10), row: parseInt(match[2], 10) };
};

/**
 * Id given to a freshly reconstructed hole before grid numbering.
 */
export const provisionalHoleId = (ordinal: number): string => `H${String(ordinal).padStart(5, '0')}`;

export const getSectorLabel = (sector: number): string => `sector_${sector + 1}`;

export const getStatusName = (status: HoleStatus): string => {
    switch (status) {
        case HoleStatus.Pending: return 'Pending';
        case HoleStatus.Processing: return 'Processing';
        case HoleStatus.Qualified: return 'Qualified';
        case HoleStatus.Defective: return 'Defective';
        case HoleStatus.Blind: return 'Blind';
        case HoleStatus.TieRod: return 'Tie rod';
        default: return 'Unknown';
    }
};
