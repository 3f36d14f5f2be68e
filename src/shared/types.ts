// -----------------------------------------------------------------------------
// Shared Types - Project, page and render records owned by the workflow engine
// -----------------------------------------------------------------------------

export const PROJECT_STATES = [
  'planning',
  'styling',
  'drafting_art',
  'rendering',
  'qa',
  'exported',
  'failed',
] as const;

export type ProjectState = (typeof PROJECT_STATES)[number];

export const AUDIENCE_BANDS = [
  'children_0-2',
  'children_3-6',
  'children_7-10',
  'children_11-14',
  'young_adult_15-17',
  'adult_18+',
  'all_ages',
] as const;

export type AudienceBand = (typeof AUDIENCE_BANDS)[number];

export type RenderVerdict = 'pending' | 'pass' | 'drift' | 'failed';

export type PdfOrientation = 'portrait' | 'landscape';

export interface ImageArtifact {
  /** Store key, unique within the project's artifact namespace */
  id: string;
  uri: string;
  mimeType: string;
  byteLength: number;
}

export interface DocumentArtifact {
  id: string;
  uri: string;
  pageCount: number;
  byteLength: number;
  orientation: PdfOrientation;
}

export interface Character {
  name: string;
  /** Short canonical description repeated in every prompt that shows this character */
  visualTag: string;
  referenceImage?: ImageArtifact;
}

export interface StyleReference {
  image: ImageArtifact;
  descriptor: string;
}

export interface PageOutline {
  index: number;
  text: string;
  sceneIntent: string;
  characters: string[];
}

export interface CharacterDirective {
  name: string;
  visualTag: string;
}

export interface ArtSpec {
  pageIndex: number;
  composition: string;
  camera: string;
  lighting: string;
  palette: string;
  characterDirectives: CharacterDirective[];
  negativeConstraints: string[];
  /** 0 for the initial spec, incremented each time QA tightens it */
  revision: number;
  prompt: string;
}

export type DriftCategory = 'palette' | 'wardrobe' | 'appearance' | 'style' | 'other';

export interface DriftIssue {
  category: DriftCategory;
  /** Character name when the drift concerns one character */
  subject?: string;
  description: string;
}

export interface RenderResult {
  pageIndex: number;
  image?: ImageArtifact;
  /** Artifact ids of the reference images, in the order they were sent */
  references: string[];
  verdict: RenderVerdict;
  retryCount: number;
  driftIssues: DriftIssue[];
  lastError?: string;
  /** The provider refused the prompt on policy grounds; the page is not rendered again */
  blocked?: boolean;
  /** Image id that produced the current verdict */
  evaluatedImageId?: string;
}

export interface ProjectWarning {
  stage: ProjectState;
  pageIndex?: number;
  message: string;
}

export interface FailureReport {
  code: string;
  stage: string;
  message: string;
  retriesConsumed: number;
  pageIndices?: number[];
  characterName?: string;
}

export interface Project {
  id: string;
  slug: string;
  title: string;
  topic: string;
  brief: string;
  audience: AudienceBand;
  targetPageCount: number;
  styleDescriptor: string;
  continuity: boolean;
  /** Character names named in the brief, in order of first mention */
  characterRoster: string[];
  /** True when the brief fixed the cast explicitly; the outline may then use no one else */
  rosterConstrained: boolean;
  characters: Character[];
  pages: PageOutline[];
  artSpecs: ArtSpec[];
  renders: RenderResult[];
  styleReference?: StyleReference;
  state: ProjectState;
  warnings: ProjectWarning[];
  failure?: FailureReport;
  document?: DocumentArtifact;
  createdAt: string;
  updatedAt: string;
}

export interface StoryPage {
  outline: PageOutline;
  artSpec: ArtSpec;
  render: RenderResult;
}

export interface StoryRecord {
  projectId: string;
  slug: string;
  title: string;
  audience: AudienceBand;
  styleDescriptor: string;
  styleReference: StyleReference;
  characters: Character[];
  pages: StoryPage[];
  assembledAt: string;
}

export interface ProjectSnapshot {
  projectId: string;
  state: ProjectState;
  /** Stage transition that produced this snapshot, e.g. "styling->drafting_art" */
  transition: string;
  capturedAt: string;
  project: Project;
}
