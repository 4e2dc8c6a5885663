import { CommentStyle } from '../models/commentStyle';
import { FileTransformResult } from '../models/fileTransformResult';
import { HeaderSpan } from '../models/headerSpan';
import { HeaderTemplate } from '../models/headerTemplate';
import { UpdateOptions, YearsUpdateOptions } from '../models/updateOptions';
import { VariableSet } from '../models/variableSet';
import { getCurrentYear, mergeYears } from '../utils/dateUtils';
import { isBlank, joinLines, splitLines } from '../utils/textUtils';
import { DetectionService } from './detectionService';
import { KeepLineService } from './keepLineService';
import { TemplateService } from './templateService';

const YEARS_PATTERN = /\b(19|20)\d{2}(\s*-\s*(19|20)\d{2})?\b/;

/**
 * Service for inserting or replacing the license header of one file
 */
export class HeaderUpdateService {
  /**
   * Transform a whole file's text.
   * Keep-lines stay first and untouched; an existing header right after them
   * is replaced, otherwise the new header is inserted there, followed by a
   * blank line.
   * @param fileText Original file content
   * @param style Comment style of the file
   * @param template Header template
   * @param variables Resolved variables
   * @param options Update mode and year policy
   * @throws MissingVariableError when the template needs a variable that is not set
   */
  public static update(
    fileText: string,
    style: CommentStyle,
    template: HeaderTemplate,
    variables: VariableSet,
    options: UpdateOptions,
  ): FileTransformResult {
    const split = splitLines(fileText);
    const { remainderStart } = KeepLineService.extractKeepLines(split.lines, style);
    const remainder = split.lines.slice(remainderStart);

    const span = DetectionService.findHeader(remainder, style);
    const spanLines = span ? remainder.slice(span.startLine, span.endLine) : [];
    const spanText = spanLines.join('\n');

    if (options.mode === 'addOnly' && span?.isLicense) {
      return { newContent: fileText, changed: false };
    }

    const existingYears = span?.isLicense ? DetectionService.extractYears(spanText) : undefined;
    const years = this.effectiveYears(variables.years, existingYears, options);
    const header = TemplateService.render(
      template,
      years === undefined ? variables : { ...variables, years },
      style,
    );

    // A comment that is not a license notice only counts as the header when
    // it is exactly what would be written
    const existing: HeaderSpan | undefined =
      span && (span.isLicense || spanText === header.join('\n')) ? span : undefined;
    if (options.mode === 'addOnly' && existing) {
      return { newContent: fileText, changed: false };
    }

    const headStart = remainderStart + (existing ? existing.startLine : 0);
    const tailStart = remainderStart + (existing ? existing.endLine : 0);
    const after = split.lines.slice(tailStart);
    const separator = after.length > 0 && !isBlank(after[0]) ? [''] : [];
    const inserted = [...header, ...separator];

    // Untouched lines keep their own terminators; inserted ones take the dominant one
    const newContent = joinLines({
      ...split,
      lines: [...split.lines.slice(0, headStart), ...inserted, ...after],
      terminators: [
        ...split.terminators.slice(0, headStart),
        ...inserted.map(() => split.eol),
        ...split.terminators.slice(tailStart),
      ],
    });
    return { newContent, changed: newContent !== fileText };
  }

  /**
   * Rewrite only the year token of an existing license header.
   * Files without such a header, or without a year in it, are left alone.
   */
  public static updateYears(fileText: string, style: CommentStyle, options: YearsUpdateOptions): FileTransformResult {
    const unchanged = { newContent: fileText, changed: false };
    const split = splitLines(fileText);
    const { remainderStart } = KeepLineService.extractKeepLines(split.lines, style);
    const remainder = split.lines.slice(remainderStart);

    const span = DetectionService.findHeader(remainder, style);
    if (!span?.isLicense) {
      return unchanged;
    }

    const start = remainderStart + span.startLine;
    const end = remainderStart + span.endLine;
    for (let i = start; i < end; i++) {
      const found = DetectionService.extractYears(split.lines[i]);
      if (found === undefined) {
        continue;
      }
      const years = this.effectiveYears(options.years, found, {
        mode: 'replace',
        yearsExplicit: options.years !== undefined,
        refreshYears: options.refreshYears,
        currentYear: options.currentYear,
      });
      if (years === undefined || years === found) {
        return unchanged;
      }

      const lines = [...split.lines];
      lines[i] = lines[i].replace(YEARS_PATTERN, years);
      const newContent = joinLines({ ...split, lines });
      return { newContent, changed: newContent !== fileText };
    }

    return unchanged;
  }

  /**
   * Year value to render: an explicit value wins, then the years of the
   * existing header (extended to the current year on refresh), then the
   * value already in the variables.
   */
  private static effectiveYears(
    given: string | undefined,
    existing: string | undefined,
    options: UpdateOptions,
  ): string | undefined {
    if (options.yearsExplicit && given !== undefined) {
      return given;
    }
    if (existing !== undefined) {
      return options.refreshYears ? mergeYears(existing, options.currentYear ?? getCurrentYear()) : existing;
    }
    return given;
  }
}
