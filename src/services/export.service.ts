/**
 * Export Service
 *
 * Serializes the run's two outputs for the uploader and report renderer, and
 * lays out what a reviewer opens by hand: one HTML file per lesson and a copy
 * of the course assets the lessons link to.
 */

import * as fs from 'fs';
import * as path from 'path';

import { encode } from 'html-entities';

import { MigrationReportSnapshot } from '../models/migration-report.model';
import { TargetCourseGraph, TargetLesson } from '../models/target-entity.model';
import { htmlToText } from '../utils/html-cleaner';
import { normalizeId } from '../utils/id-generator';

import { MigrationResult } from './migration-pipeline.service';

export const COURSE_GRAPH_FILENAME = 'course_graph.json';
export const MIGRATION_REPORT_FILENAME = 'migration_report.json';
export const LESSONS_DIRECTORY = 'lessons';
export const ASSETS_DIRECTORY = 'assets';

const EXCERPT_LENGTH = 160;

export function serializeCourseGraph(graph: TargetCourseGraph): string {
  return `${JSON.stringify(graph, null, 2)}\n`;
}

export function serializeReport(report: MigrationReportSnapshot): string {
  return `${JSON.stringify(report, null, 2)}\n`;
}

/**
 * Standalone page for one lesson; the excerpt is the first words of its text
 */
export function renderLessonPage(lesson: TargetLesson): string {
  const title = encode(lesson.title);
  const excerpt = htmlToText(lesson.content).slice(0, EXCERPT_LENGTH);
  return [
    '<!DOCTYPE html>',
    '<html>',
    '<head>',
    '<meta charset="utf-8">',
    `<title>${title}</title>`,
    `<meta name="description" content="${encode(excerpt)}">`,
    '</head>',
    '<body>',
    `<h1>${title}</h1>`,
    lesson.content,
    '</body>',
    '</html>',
    '',
  ].join('\n');
}

/**
 * `01-intro`: 1-based position and a slug of the title (or id when the title
 * has no usable characters)
 */
function orderedName(position: number, title: string, id: string): string {
  const slug = normalizeId([title]) || normalizeId([id]);
  return `${String(position + 1).padStart(2, '0')}-${slug}`;
}

/**
 * Write `lessons/<topic>/<lesson>.html` for every lesson
 */
function writeLessonPages(graph: TargetCourseGraph, outputDir: string): string[] {
  const written: string[] = [];

  for (const topic of graph.course.topics) {
    const topicDir = path.join(
      outputDir,
      LESSONS_DIRECTORY,
      orderedName(topic.position, topic.title, topic.id)
    );

    for (const item of topic.items) {
      if (item.kind !== 'lesson') {
        continue;
      }
      fs.mkdirSync(topicDir, { recursive: true });
      const fileName = `${orderedName(item.position, item.title, item.id)}.html`;
      const pagePath = path.join(topicDir, fileName);
      fs.writeFileSync(pagePath, renderLessonPage(item));
      written.push(pagePath);
    }
  }

  return written;
}

/**
 * Write the graph, lesson pages and assets (when there is a graph) and the
 * report; returns the written paths, the assets directory as one entry
 */
export function exportMigration(result: MigrationResult, outputDir: string): string[] {
  fs.mkdirSync(outputDir, { recursive: true });
  const written: string[] = [];

  if (result.graph) {
    const graphPath = path.join(outputDir, COURSE_GRAPH_FILENAME);
    fs.writeFileSync(graphPath, serializeCourseGraph(result.graph));
    written.push(graphPath);

    written.push(...writeLessonPages(result.graph, outputDir));

    const assetSource = path.join(result.sourceDir, result.assetRootDir);
    if (fs.existsSync(assetSource)) {
      const assetTarget = path.join(outputDir, ASSETS_DIRECTORY);
      fs.cpSync(assetSource, assetTarget, { recursive: true });
      written.push(assetTarget);
    }
  }

  const reportPath = path.join(outputDir, MIGRATION_REPORT_FILENAME);
  fs.writeFileSync(reportPath, serializeReport(result.report));
  written.push(reportPath);

  return written;
}
