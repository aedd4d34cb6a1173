/**
 * One content unit (page of a container) per section
 */
export interface ContentUnit {
  id: string;
  name: string;
  // Display level clamped to 1..3
  level: number;
  sort: number;
  pathKey: string[];
  content: string;
}

/**
 * One container entry per chapter, plus the optional generated TOC
 */
export interface ContainerEntry {
  id: string;
  name: string;
  kind: 'chapter' | 'toc';
  pathKey: string[];
  // Folder path in the target system: [book title, entry name]
  folder: string[];
  sort: number;
  units: ContentUnit[];
}
