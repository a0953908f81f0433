import inquirer from 'inquirer';
import { normalizeFilename, toPositiveInt } from './options.js';

export interface RunAnswers {
    years: number;
    filename?: string;
}

export function validateYearsAnswer(value: string): true | string {
    if (value.trim() === '' || toPositiveInt(value) !== null) {
        return true;
    }
    return 'Enter a positive whole number of years';
}

/**
 * Asks only for what the command line left open. A blank years answer keeps
 * `defaultYears`; a blank filename means auto-generated.
 */
export async function promptForMissing(
    given: { years?: number; filename?: string },
    defaultYears: number
): Promise<RunAnswers> {
    let years = given.years;
    let filename = given.filename;

    if (years === undefined) {
        const answer = await inquirer.prompt<{ years: string }>([
            {
                type: 'input',
                name: 'years',
                message: `Enter number of years to scrape (default: ${defaultYears}):`,
                validate: validateYearsAnswer,
            },
        ]);
        years = toPositiveInt(answer.years) ?? defaultYears;
    }

    if (filename === undefined) {
        const answer = await inquirer.prompt<{ filename: string }>([
            {
                type: 'input',
                name: 'filename',
                message: 'Enter output filename (default: auto-generated):',
            },
        ]);
        filename = normalizeFilename(answer.filename);
    }

    return { years, filename };
}
