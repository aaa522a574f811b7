import * as fs from 'fs/promises';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';

/**
 * The errno code of a filesystem error, if it has one
 */
export function errorCode(error: unknown): string | undefined {
    if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

/**
 * Helper to check if a file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
    try {
        await fs.access(filePath);
        return true;
    } catch {
        return false;
    }
}

/**
 * Replace a file's content through a sibling temp file and rename,
 * so readers never observe a half-written file. Each write gets its own
 * temp name, so overlapping writes cannot rename each other's file.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    const tempFile = `${filePath}.${uuidv4()}.tmp`;
    try {
        await fs.writeFile(tempFile, content, 'utf-8');
        await fs.rename(tempFile, filePath);
    } catch (error) {
        await fs.rm(tempFile, { force: true });
        throw error;
    }
}
