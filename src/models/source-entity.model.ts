/**
 * Source Entity Model
 *
 * Mirrors the cartridge export as it is read from disk: the resource map and
 * organization tree from the manifest, and the content entities extracted from
 * the files they point at (plus entities recovered from unreferenced files).
 *
 * Everything here is produced once and never mutated afterwards.
 */

/**
 * Declared resource type, classified from the manifest `type` attribute
 */
export type ResourceType = 'page' | 'assignment' | 'quiz' | 'web-content' | 'asset' | 'unknown';

/**
 * One `<resource>` entry of the manifest
 */
export interface ResourceDescriptor {
  /** Unique within the course */
  readonly identifier: string;

  /** Classified type */
  readonly type: ResourceType;

  /** Raw manifest `type` attribute */
  readonly rawType: string;

  /** Normalized relative POSIX path of the primary file (empty when absent) */
  readonly href: string;

  /** Every `<file href>` declared under the resource, normalized */
  readonly files: readonly string[];

  /** Identifiers named by `<dependency identifierref>` */
  readonly dependencies: readonly string[];

  /** Inline title, when the resource carries one */
  readonly title?: string;
}

/**
 * Node of the organization tree
 */
export interface OrganizationNode {
  readonly identifier: string;
  readonly title: string;
  readonly children: readonly OrganizationNode[];

  /** Resource identifier this node points at (manifest nodes only) */
  readonly resourceRef?: string;

  /** Recovered entity id (synthetic recovered module only) */
  readonly recoveredEntityId?: string;
}

/**
 * Where a source entity came from
 */
export type EntityOrigin = 'manifest' | 'recovered';

/**
 * Fields shared by every source entity
 */
interface SourceEntityBase {
  /** Resource identifier, or derived identifier for recovered content */
  readonly id: string;

  /** Explicit title found in the content itself */
  readonly title?: string;

  /** Markup as read from disk */
  readonly rawContent: string;

  /** Top-level module the entity sits under (lookup only) */
  readonly parentModuleId?: string;

  readonly origin: EntityOrigin;

  /** Relative path of the file the entity was read from */
  readonly sourcePath: string;
}

export interface PageEntity extends SourceEntityBase {
  readonly kind: 'page';
  readonly body: string;
  readonly notes?: string;

  /** Declared type of the resource the page was built from */
  readonly resourceType: ResourceType;
}

export interface AssignmentMetadata {
  readonly pointsPossible?: number;
  readonly dueAt?: string;
  readonly unlockAt?: string;
  readonly lockAt?: string;
  readonly gradingType?: string;
  readonly submissionTypes: readonly string[];
}

export interface AssignmentEntity extends SourceEntityBase {
  readonly kind: 'assignment';
  readonly body: string;
  readonly metadata: AssignmentMetadata;
}

export interface SourceAnswer {
  readonly id: string;
  readonly text: string;
  readonly correct: boolean;
}

export interface QuestionEntity extends SourceEntityBase {
  readonly kind: 'question';

  /** Source question kind, e.g. `multiple_choice_question` */
  readonly sourceKind: string;
  readonly text: string;
  readonly points: number;
  readonly answers: readonly SourceAnswer[];
  readonly feedback?: string;
}

export interface QuizSettings {
  readonly timeLimitMinutes?: number;
  readonly allowedAttempts?: number;
}

export interface QuizEntity extends SourceEntityBase {
  readonly kind: 'quiz';
  readonly description: string;
  readonly settings: QuizSettings;

  /** Questions in document order */
  readonly questions: readonly QuestionEntity[];
}

export interface RecoveredContentEntity extends SourceEntityBase {
  readonly kind: 'recovered';
  readonly origin: 'recovered';
  readonly body: string;
  readonly notes?: string;
}

export type SourceEntity =
  | PageEntity
  | AssignmentEntity
  | QuizEntity
  | QuestionEntity
  | RecoveredContentEntity;

/**
 * Entity that a leaf organization node can point at
 */
export type ContentEntity = PageEntity | AssignmentEntity | QuizEntity | RecoveredContentEntity;

/**
 * Output of the Manifest Resolver
 */
export interface ResolvedManifest {
  readonly identifier: string;
  readonly courseTitle: string;
  readonly resources: ReadonlyMap<string, ResourceDescriptor>;

  /** Course-rooted organization tree */
  readonly tree: OrganizationNode;
}

/**
 * Merged, resolved source graph handed to the transformer
 */
export interface SourceCourse {
  readonly manifest: ResolvedManifest;

  /** Manifest tree with the recovered module appended (when any) */
  readonly tree: OrganizationNode;

  /** Content entities keyed by resource identifier or recovered id */
  readonly entities: ReadonlyMap<string, ContentEntity>;

  /** Source paths of recovered entities, sorted */
  readonly recoveredPaths: readonly string[];

  /** Unreferenced markup files recovery attempted, sorted */
  readonly orphanCandidates: readonly string[];
}
