import { Injectable, Logger } from '@nestjs/common';
import { writeFile } from 'fs/promises';
import { jsPDF } from 'jspdf';
import { assertQuizIntegrity } from '../quiz/quiz-grader';
import { QuizExportError } from '../quiz/quiz.errors';
import {
  QuizResponse,
  formatOption,
  optionLetter,
} from '../quiz/types/quiz-question.interface';

export interface QuizPdfOptions {
  includeAnswers?: boolean;
}

const MARGIN = 48;
const TITLE_COLOR = '#1A237E';
const TITLE_SIZE = 20;
const BODY_SIZE = 11;
const LINE_HEIGHT = 1.35;

@Injectable()
export class QuizPdfService {
  private readonly logger = new Logger(QuizPdfService.name);

  /**
   * Renders the quiz as an A4 document: a centered title, then every question
   * as `Q<id>. <prompt>` followed by its lettered options in order, and an
   * optional answer key on the last pages. A quiz whose answers are not among
   * its options is refused with an `InvalidQuizRequestError`.
   */
  render(quiz: QuizResponse, options: QuizPdfOptions = {}): Buffer {
    assertQuizIntegrity(quiz);
    try {
      const doc = new jsPDF({ unit: 'pt', format: 'a4' });
      const layout = new PageCursor(doc);

      layout.title(quiz.title);
      layout.paragraph(
        `Topic: ${quiz.topic}   Difficulty: ${quiz.difficulty}   Questions: ${quiz.questions.length}`,
        { size: 9 },
      );
      layout.space(14);

      for (const question of quiz.questions) {
        layout.paragraph(`Q${question.id}. ${question.prompt}`, {
          bold: true,
        });
        question.options.forEach((_, index) => {
          layout.paragraph(formatOption(question.options, index), {
            indent: 16,
          });
        });
        layout.space(10);
      }

      if (options.includeAnswers) {
        layout.space(10);
        layout.heading('Answer Key');
        for (const question of quiz.questions) {
          const index = question.options.indexOf(question.answer);
          layout.paragraph(
            `${question.id}. ${optionLetter(index)}. ${question.answer}`,
          );
          if (question.explanation) {
            layout.paragraph(question.explanation, { indent: 16, size: 9 });
          }
        }
      }

      return Buffer.from(doc.output('arraybuffer'));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`PDF rendering failed for "${quiz.title}"`, message);
      throw new QuizExportError('The quiz could not be rendered as a PDF.', {
        cause: error,
      });
    }
  }

  async writeToFile(
    quiz: QuizResponse,
    filePath: string,
    options: QuizPdfOptions = {},
  ): Promise<void> {
    const pdf = this.render(quiz, options);
    try {
      await writeFile(filePath, pdf);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Could not write PDF to ${filePath}`, message);
      throw new QuizExportError(`Could not write the PDF to ${filePath}.`, {
        cause: error,
      });
    }
    this.logger.log(`Exported "${quiz.title}" to ${filePath}`);
  }

  fileName(quiz: QuizResponse): string {
    const slug = quiz.title
      .toLowerCase()
      .replace(/[^a-z0-9]+/g, '-')
      .replace(/^-+|-+$/g, '');
    return `${slug || 'quiz'}.pdf`;
  }
}

interface ParagraphStyle {
  bold?: boolean;
  indent?: number;
  size?: number;
}

/** Writes wrapped lines top to bottom, adding pages as they fill up. */
class PageCursor {
  private y = MARGIN;
  private readonly pageWidth: number;
  private readonly pageHeight: number;

  constructor(private readonly doc: jsPDF) {
    this.pageWidth = doc.internal.pageSize.getWidth();
    this.pageHeight = doc.internal.pageSize.getHeight();
  }

  title(text: string): void {
    this.doc.setFont('helvetica', 'bold');
    this.doc.setFontSize(TITLE_SIZE);
    this.doc.setTextColor(TITLE_COLOR);
    const lines: string[] = this.doc.splitTextToSize(
      text,
      this.pageWidth - MARGIN * 2,
    );
    for (const line of lines) {
      this.ensureRoom(TITLE_SIZE * LINE_HEIGHT);
      this.doc.text(line, this.pageWidth / 2, this.y, {
        align: 'center',
        baseline: 'top',
      });
      this.y += TITLE_SIZE * LINE_HEIGHT;
    }
    this.doc.setTextColor('#000000');
    this.y += 4;
  }

  heading(text: string): void {
    this.paragraph(text, { bold: true, size: 14 });
    this.y += 4;
  }

  paragraph(text: string, style: ParagraphStyle = {}): void {
    const size = style.size ?? BODY_SIZE;
    const indent = style.indent ?? 0;
    const lineHeight = size * LINE_HEIGHT;

    this.doc.setFont('helvetica', style.bold ? 'bold' : 'normal');
    this.doc.setFontSize(size);
    const lines: string[] = this.doc.splitTextToSize(
      text,
      this.pageWidth - MARGIN * 2 - indent,
    );
    for (const line of lines) {
      this.ensureRoom(lineHeight);
      this.doc.text(line, MARGIN + indent, this.y, { baseline: 'top' });
      this.y += lineHeight;
    }
  }

  space(points: number): void {
    this.y += points;
  }

  private ensureRoom(height: number): void {
    if (this.y + height > this.pageHeight - MARGIN) {
      this.doc.addPage();
      this.y = MARGIN;
    }
  }
}
