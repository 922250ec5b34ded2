import fs from 'fs';
import path from 'path';

const PROMPTS_DIR = path.resolve(__dirname, '../../prompts');

export type PromptName = 'extract_requirements' | 'match_evidence' | 'tailor_resume' | 'refine_resume';

export function loadPrompt(name: PromptName, promptsDir: string = PROMPTS_DIR): string {
    return fs.readFileSync(path.join(promptsDir, `${name}.txt`), 'utf-8');
}

/**
 * Substitute `{{placeholder}}` markers in one pass. Values are inserted
 * literally and never rescanned; unknown placeholders are left in place.
 */
export function renderPrompt(template: string, values: Record<string, string>): string {
    return template.replace(/\{\{(\w+)\}\}/g, (marker: string, placeholder: string) =>
        Object.hasOwn(values, placeholder) ? values[placeholder] : marker
    );
}
