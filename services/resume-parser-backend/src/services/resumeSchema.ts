import { z } from 'zod'

const scalarText = z.union([z.string(), z.number().transform(String)])

// Items that fail their schema are dropped one by one; the rest of the list stays.
function keepParsed<T extends z.ZodTypeAny>(schema: T, items: unknown[]): z.output<T>[] {
  const kept: z.output<T>[] = []
  for (const item of items) {
    const result = schema.safeParse(item)
    if (result.success) kept.push(result.data)
  }
  return kept
}

const listOf = <T extends z.ZodTypeAny>(schema: T) =>
  z.array(z.unknown()).catch(() => []).transform((items) => keepParsed(schema, items))

const text = () => scalarText.catch('')
const textList = () => listOf(scalarText)

const basicsSchema = z.object({
  name: text(),
  email: text(),
  phone: text(),
  location: text(),
  website: text(),
  linkedin: text(),
  summary: text()
})

const skillsSchema = z.object({
  technical: textList(),
  professional: textList(),
  languages_programming: textList(),
  tools: textList()
})

export const resumeEntrySchemas = {
  work: z.object({
    company: text(),
    position: text(),
    startDate: text(),
    endDate: text(),
    description: text(),
    highlights: textList()
  }),
  education: z.object({
    institution: text(),
    degree: text(),
    field: text(),
    startDate: text(),
    endDate: text(),
    gpa: text(),
    description: text()
  }),
  projects: z.object({
    name: text(),
    description: text(),
    technologies: textList(),
    startDate: text(),
    endDate: text(),
    url: text(),
    highlights: textList()
  }),
  volunteer: z.object({
    organization: text(),
    position: text(),
    startDate: text(),
    endDate: text(),
    description: text(),
    highlights: textList()
  }),
  awards: z.object({
    title: text(),
    date: text(),
    awarder: text(),
    description: text()
  }),
  certificates: z.object({
    name: text(),
    issuer: text(),
    date: text(),
    url: text(),
    description: text()
  }),
  publications: z.object({
    title: text(),
    publisher: text(),
    date: text(),
    url: text(),
    description: text()
  }),
  languages: z.object({
    language: text(),
    fluency: text()
  }),
  interests: z.object({
    name: text(),
    keywords: textList()
  }),
  references: z.object({
    name: text(),
    position: text(),
    company: text(),
    email: text(),
    phone: text(),
    relationship: text()
  })
}

export type ResumeListSection = keyof typeof resumeEntrySchemas

export const RESUME_LIST_SECTIONS = [
  'work',
  'education',
  'projects',
  'volunteer',
  'awards',
  'certificates',
  'publications',
  'languages',
  'interests',
  'references'
] as const satisfies readonly ResumeListSection[]

/**
 * Canonical resume shape. Every field is optional on input and always present
 * on output: missing or mistyped strings become '', lists become [] and
 * unknown keys are dropped.
 */
export const resumeRecordSchema = z.object({
  basics: basicsSchema.catch(() => basicsSchema.parse({})),
  work: listOf(resumeEntrySchemas.work),
  education: listOf(resumeEntrySchemas.education),
  skills: skillsSchema.catch(() => skillsSchema.parse({})),
  projects: listOf(resumeEntrySchemas.projects),
  volunteer: listOf(resumeEntrySchemas.volunteer),
  awards: listOf(resumeEntrySchemas.awards),
  certificates: listOf(resumeEntrySchemas.certificates),
  publications: listOf(resumeEntrySchemas.publications),
  languages: listOf(resumeEntrySchemas.languages),
  interests: listOf(resumeEntrySchemas.interests),
  references: listOf(resumeEntrySchemas.references)
})

export type ResumeRecord = z.infer<typeof resumeRecordSchema>

export function createEmptyResume(): ResumeRecord {
  return resumeRecordSchema.parse({})
}

export function normalizeResume(value: Record<string, unknown>): ResumeRecord {
  return resumeRecordSchema.parse(value)
}

// Same shape as createEmptyResume, with one blank entry per list so the model
// sees every entry's fields.
export function buildResumeTemplate(): Record<string, unknown> {
  const template: Record<string, unknown> = { ...createEmptyResume() }
  for (const section of RESUME_LIST_SECTIONS) {
    template[section] = [resumeEntrySchemas[section].parse({})]
  }
  return template
}
