import { fileURLToPath } from 'url';
import { resolve, dirname } from 'path';
import { readFileSync } from 'fs';

const __dirname = dirname(fileURLToPath(import.meta.url));
// tsx: src/utils/ → src/skills/; build: dist/utils/ → dist/skills/ (copied by the build script)
const skillsDir = resolve(__dirname, '../skills');

export function loadSkill(name: string, dir: string = skillsDir): string {
  return readFileSync(resolve(dir, `${name}.md`), 'utf-8');
}

/** Fills `{{key}}` placeholders; unknown placeholders are left as written. */
export function renderTemplate(template: string, vars: Record<string, string>): string {
  let out = template;
  for (const [key, value] of Object.entries(vars)) {
    out = out.replaceAll(`{{${key}}}`, value);
  }
  return out;
}

export function loadSkillTemplate(name: string, vars: Record<string, string>, dir: string = skillsDir): string {
  return renderTemplate(loadSkill(name, dir), vars);
}
