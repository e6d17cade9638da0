import fs from 'fs';
import path from 'path';
import { diaryTemplatesSchema } from '../schemas/diary.schema';
import { DiaryTemplate } from '../types/diary';
import { ValidationError } from '../utils/errors';

export function loadDiaryTemplates(templatesPath: string): Record<string, DiaryTemplate> {
  const resolved = path.resolve(process.cwd(), templatesPath);
  const raw: unknown = JSON.parse(fs.readFileSync(resolved, 'utf8'));

  const parsed = diaryTemplatesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(
      `Invalid diary templates in ${resolved}: ${parsed.error.issues.map((i) => `${i.path.join('.')} ${i.message}`).join(', ')}`
    );
  }

  return parsed.data;
}
