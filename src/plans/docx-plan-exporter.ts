/**
 * Word (.docx) rendering of a plan: heading, one table row per entry with a
 * column per weekday, and the total area underneath.
 */

import { Injectable } from '@nestjs/common';
import {
  Document,
  HeadingLevel,
  Packer,
  Paragraph,
  Table,
  TableCell,
  TableRow,
  TextRun,
  WidthType,
} from 'docx';
import { ALL_DAYS, type Plan, type PlanEntry } from '../types/plan.types.js';
import { PlanExporter, type RenderedDocument } from './plan-exporter.js';

const DOCX_CONTENT_TYPE = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';

const HEADERS = ['Nr', 'Rom', 'Etasje', 'Areal (m²)', 'Beskrivelse', ...ALL_DAYS, 'Merknad'];

export function formatArea(value: number | null): string {
  if (value === null) return '';
  return Number.isInteger(value) ? String(value) : value.toFixed(1);
}

/** Cell texts for one entry, in HEADERS order */
export function entryCells(entry: PlanEntry): string[] {
  return [
    String(entry.id),
    entry.roomName,
    entry.floor ?? '',
    formatArea(entry.areaM2),
    entry.description,
    ...ALL_DAYS.map((day) => (entry.frequency[day] ? 'x' : '')),
    entry.notes ?? '',
  ];
}

function cell(text: string, bold = false): TableCell {
  return new TableCell({
    children: [new Paragraph({ children: [new TextRun({ text, bold })] })],
  });
}

@Injectable()
export class DocxPlanExporter extends PlanExporter {
  async render(plan: Plan): Promise<RenderedDocument> {
    const title = plan.templateName ?? 'Renholdsplan';

    const table = new Table({
      width: { size: 100, type: WidthType.PERCENTAGE },
      rows: [
        new TableRow({ tableHeader: true, children: HEADERS.map((h) => cell(h, true)) }),
        ...plan.entries.map((entry) => new TableRow({ children: entryCells(entry).map((t) => cell(t)) })),
      ],
    });

    const document = new Document({
      creator: 'floorplan-cleaning-planner',
      title,
      sections: [
        {
          children: [
            new Paragraph({ text: title, heading: HeadingLevel.HEADING_1 }),
            new Paragraph({ text: `Opprettet ${plan.createdAt.slice(0, 10)}` }),
            table,
            new Paragraph({
              children: [new TextRun({ text: `Totalt areal: ${formatArea(plan.totalAreaM2)} m²`, bold: true })],
            }),
          ],
        },
      ],
    });

    return {
      filename: `renholdsplan-${plan.id}.docx`,
      contentType: DOCX_CONTENT_TYPE,
      data: await Packer.toBuffer(document),
    };
  }
}
