/**
 * Course Store Types
 *
 * The retrieval side of the assistant: indexed course passages plus the
 * structural metadata (courses, lessons, links) the tools report on.
 */

export interface Lesson {
  lessonNumber: number;
  title: string;
  link?: string;
}

export interface Course {
  title: string;
  link?: string;
  instructor?: string;
  lessons: Lesson[];
}

/**
 * A chunk of lesson text as indexed.
 */
export interface CourseChunk {
  content: string;
  courseTitle: string;
  lessonNumber?: number;
  chunkIndex: number;
}

/**
 * One ranked search hit. Metadata can be missing on legacy rows.
 */
export interface Passage {
  text: string;
  courseTitle?: string;
  lessonNumber?: number;
}

/**
 * Outcome of a search. `error` is set instead of throwing when the course
 * filter cannot be resolved or the backend fails.
 */
export interface SearchResults {
  passages: Passage[];
  error?: string;
}

export interface CourseOutline {
  title: string;
  link?: string;
  lessons: Lesson[];
}

/**
 * Interface for course retrieval and indexing.
 *
 * Methods return Promises for interface flexibility, but the SQLite
 * implementation (better-sqlite3) is synchronous.
 */
export interface CourseStore {
  /**
   * Ranked passages for `query`, optionally limited to the course best
   * matching `courseName` and to an exact lesson number.
   */
  search(query: string, courseName?: string, lessonNumber?: number): Promise<SearchResults>;

  lessonLink(courseTitle: string, lessonNumber: number): Promise<string | undefined>;

  /** Outline of the course best matching `courseName`, or null. */
  courseOutline(courseName: string): Promise<CourseOutline | null>;

  /** Index a course, replacing any course with the same title. */
  addCourse(course: Course, chunks: CourseChunk[]): Promise<void>;

  listCourseTitles(): Promise<string[]>;
}
