import type { MetadataStore } from '../../services/storage/metadataStore'
import { projectPath } from '../../utils/naming'
import { projectDocSchema, type ProjectDoc } from './types'

export class ProjectsRepo {
  constructor(private readonly store: MetadataStore) {}

  async get(userId: string, projectId: string): Promise<ProjectDoc | null> {
    const raw = await this.store.get(projectPath(userId, projectId))
    if (raw == null) return null
    const parsed = projectDocSchema.safeParse(raw)
    if (!parsed.success) {
      console.warn('project_doc_malformed', { userId, projectId, issues: parsed.error.issues.length })
      return null
    }
    return parsed.data
  }

  async save(userId: string, projectId: string, doc: ProjectDoc): Promise<void> {
    await this.store.set(projectPath(userId, projectId), doc)
  }

  async update(userId: string, projectId: string, patch: Partial<ProjectDoc>): Promise<void> {
    await this.store.update(projectPath(userId, projectId), patch)
  }
}
