/**
 * Manifest Parser Tests
 */

import { MigrationReport } from '../services/report-aggregator.service';

import { UNTITLED_COURSE, classifyResourceType, resolveManifest } from './manifest-parser';
import { FatalMigrationError } from './parser-result';

const MANIFEST = `<?xml version="1.0" encoding="UTF-8"?>
<manifest identifier="bio101"
  xmlns="http://www.imsglobal.org/xsd/imsccv1p1/imscp_v1p1"
  xmlns:lom="http://ltsc.ieee.org/xsd/imsccv1p1/LOM/manifest">
  <metadata>
    <lom:lom><lom:general><lom:title><lom:string>Biology 101</lom:string></lom:title></lom:general></lom:lom>
  </metadata>
  <organizations>
    <organization identifier="org_1" structure="rooted-hierarchy">
      <item identifier="LearningModules">
        <item identifier="mod1">
          <title>Week 1</title>
          <item identifier="i_welcome" identifierref="res_welcome"><title>Welcome</title></item>
          <item identifier="i_quiz" identifierref="res_quiz"><title>Quiz</title></item>
          <item identifier="i_ghost" identifierref="res_nope"><title>Ghost</title></item>
        </item>
        <item identifier="mod2"><title>Week 2</title></item>
      </item>
    </organization>
  </organizations>
  <resources>
    <resource identifier="res_welcome" type="webcontent" href="wiki_content/welcome.html">
      <file href="wiki_content/welcome.html"/>
    </resource>
    <resource identifier="res_quiz" type="imsqti_xmlv1p2/imscc_xmlv1p1/assessment">
      <file href="res_quiz/assessment_qti.xml"/>
      <file href="res_quiz/assessment_meta.xml"/>
    </resource>
    <resource identifier="res_logo" type="webcontent" href="web_resources/logo%20v2.png">
      <file href="web_resources/logo%20v2.png"/>
    </resource>
  </resources>
</manifest>`;

describe('manifest-parser', () => {
  let report: MigrationReport;

  beforeEach(() => {
    report = new MigrationReport('/courses/bio101');
  });

  describe('classifyResourceType', () => {
    it('should classify assessments and question banks as quizzes', () => {
      expect(classifyResourceType('imsqti_xmlv1p2/imscc_xmlv1p1/assessment', '')).toBe('quiz');
      expect(classifyResourceType('imsqti_xmlv1p2/imscc_xmlv1p1/question-bank', '')).toBe('quiz');
    });

    it('should classify associated content as assignments', () => {
      expect(
        classifyResourceType('associatedcontent/imscc_xmlv1p1/learning-application-resource', '')
      ).toBe('assignment');
    });

    it('should split web content by location and extension', () => {
      expect(classifyResourceType('webcontent', 'wiki_content/intro.html')).toBe('page');
      expect(classifyResourceType('webcontent', 'handouts/intro.html')).toBe('web-content');
      expect(classifyResourceType('webcontent', 'web_resources/logo.png')).toBe('asset');
    });

    it('should mark anything else unknown', () => {
      expect(classifyResourceType('imsdt_xmlv1p1', 'topic.xml')).toBe('unknown');
    });
  });

  describe('resolveManifest', () => {
    it('should read the course title from the LOM metadata', () => {
      const manifest = resolveManifest(MANIFEST, report);
      expect(manifest.identifier).toBe('bio101');
      expect(manifest.courseTitle).toBe('Biology 101');
      expect(manifest.tree.title).toBe('Biology 101');
    });

    it('should flatten the single wrapper item', () => {
      const manifest = resolveManifest(MANIFEST, report);
      expect(manifest.tree.children.map(m => m.identifier)).toEqual(['mod1', 'mod2']);
      expect(manifest.tree.children[1]).toEqual({
        identifier: 'mod2',
        title: 'Week 2',
        children: [],
      });
    });

    it('should resolve item references', () => {
      const [week1] = resolveManifest(MANIFEST, report).tree.children;
      expect(week1.children.map(c => c.resourceRef)).toEqual([
        'res_welcome',
        'res_quiz',
        undefined,
      ]);
    });

    it('should warn about unresolved references', () => {
      resolveManifest(MANIFEST, report);
      const events = report.getEvents();

      expect(events).toHaveLength(1);
      expect(events[0]).toMatchObject({
        stage: 'manifest',
        severity: 'warning',
        code: 'UNRESOLVED_REFERENCE',
        entityId: 'i_ghost',
      });
    });

    it('should build the resource map', () => {
      const { resources } = resolveManifest(MANIFEST, report);

      expect(resources.get('res_quiz')).toEqual({
        identifier: 'res_quiz',
        type: 'quiz',
        rawType: 'imsqti_xmlv1p2/imscc_xmlv1p1/assessment',
        href: 'res_quiz/assessment_qti.xml',
        files: ['res_quiz/assessment_qti.xml', 'res_quiz/assessment_meta.xml'],
        dependencies: [],
      });
      expect(resources.get('res_logo')?.href).toBe('web_resources/logo v2.png');
      expect(resources.get('res_logo')?.type).toBe('asset');
      expect(resources.get('res_welcome')?.type).toBe('page');
    });

    it('should count modules and resources', () => {
      resolveManifest(MANIFEST, report);
      expect(report.getCounter('modules')).toBe(2);
      expect(report.getCounter('resources')).toBe(3);
    });

    it('should keep several top-level items as modules', () => {
      const manifest = resolveManifest(
        '<manifest identifier="m"><organizations><organization>' +
          '<item identifier="a"><title>A</title></item>' +
          '<item><title>B</title><item><title>B1</title></item></item>' +
          '</organization></organizations><resources/></manifest>',
        report
      );

      expect(manifest.tree.children.map(m => m.identifier)).toEqual(['a', 'item-2']);
      expect(manifest.tree.children[1].children[0].identifier).toBe('item-2-item-1');
    });

    it('should fall back to the first title outside metadata', () => {
      const manifest = resolveManifest(
        '<manifest><organizations><organization><title>Org Title</title></organization>' +
          '</organizations><resources/></manifest>',
        report
      );
      expect(manifest.courseTitle).toBe('Org Title');
      expect(manifest.identifier).toBe('course');
    });

    it('should name untitled courses', () => {
      const manifest = resolveManifest(
        '<manifest><organizations><organization/></organizations><resources/></manifest>',
        report
      );
      expect(manifest.courseTitle).toBe(UNTITLED_COURSE);
    });

    it('should warn when there is no organization', () => {
      const manifest = resolveManifest(
        '<manifest><organizations/><resources/></manifest>',
        report
      );

      expect(manifest.tree.children).toEqual([]);
      expect(report.getEvents().map(e => e.code)).toEqual(['MISSING_ORGANIZATION']);
    });

    it('should keep the last of duplicate resources', () => {
      const { resources } = resolveManifest(
        '<manifest><organizations/><resources>' +
          '<resource identifier="r" type="webcontent" href="wiki_content/a.html"/>' +
          '<resource identifier="r" type="webcontent" href="wiki_content/b.html"/>' +
          '<resource type="webcontent" href="wiki_content/c.html"/>' +
          '</resources></manifest>',
        report
      );

      expect(resources.size).toBe(1);
      expect(resources.get('r')?.href).toBe('wiki_content/b.html');
      expect(report.getEvents().map(e => e.code)).toEqual([
        'DUPLICATE_RESOURCE',
        'MISSING_IDENTIFIER',
        'MISSING_ORGANIZATION',
      ]);
    });

    describe('fatal conditions', () => {
      it.each([
        ['a missing manifest', undefined],
        ['an empty manifest', '   '],
        ['malformed XML', '<manifest><organizations></manifest>'],
        ['a foreign root element', '<course><organizations/><resources/></course>'],
        ['missing organizations', '<manifest><resources/></manifest>'],
        ['missing resources', '<manifest><organizations/></manifest>'],
      ])('should abort on %s', (_label, source) => {
        expect(() => resolveManifest(source, report)).toThrow(FatalMigrationError);
      });
    });
  });
});
