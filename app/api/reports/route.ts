import { NextResponse } from 'next/server';
import { datasetToCsv, parseOrdersCsv, reportToCsv } from '@/lib/csv';
import { buildProcessingSummary, generateAnalyticsReports } from '@/lib/data';
import { DatasetFormatError, SchemaError, UploadTooLargeError } from '@/lib/errors';
import { formatCurrency, formatNumber } from '@/lib/formatters';
import { getMaxUploadBytes, SUPPORTED_MIME_TYPES } from '@/lib/constants/limits';
import {
  CATEGORY_COUNT_COLUMNS,
  REGION_PROFIT_COLUMNS,
  REPORT_NAMES,
  SHIP_METHOD_COLUMNS,
  isReportName,
} from '@/lib/constants/reports';
import type { AnalyticsReports, ReportName } from '@/lib/types';

export const runtime = 'nodejs';

const LOG_PREFIX = '[Reports API]';
const RAW_BODY_NAME = 'request-body.csv';

interface UploadedOrders {
  name: string;
  text: string;
}

// Reject on the declared length before the body is read
function checkDeclaredLength(request: Request, limit: number): void {
  const declared = Number(request.headers.get('content-length'));
  if (Number.isFinite(declared) && declared > limit) {
    throw new UploadTooLargeError(limit);
  }
}

// Orders CSV from a multipart "file" field or a raw text/csv body
async function readUpload(request: Request): Promise<UploadedOrders | null> {
  const limit = getMaxUploadBytes();
  const contentType = request.headers.get('content-type') ?? '';
  checkDeclaredLength(request, limit);

  if (contentType.startsWith('multipart/form-data')) {
    let formData: FormData;
    try {
      formData = await request.formData();
    } catch (error: unknown) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new DatasetFormatError(`Could not read multipart body: ${reason}`);
    }
    const file = formData.get('file');
    if (file === null || typeof file === 'string') {
      return null;
    }
    if (file.size > limit) {
      throw new UploadTooLargeError(limit);
    }
    if (file.type && !SUPPORTED_MIME_TYPES.includes(file.type)) {
      console.warn(`${LOG_PREFIX} Unrecognized MIME type:`, file.type);
    }
    return { name: file.name || RAW_BODY_NAME, text: await file.text() };
  }

  const body = await request.arrayBuffer();
  if (body.byteLength > limit) {
    throw new UploadTooLargeError(limit);
  }
  return { name: RAW_BODY_NAME, text: new TextDecoder().decode(body) };
}

function renderReport(reports: AnalyticsReports, name: ReportName): string {
  switch (name) {
    case 'orders_with_profit':
      return datasetToCsv(reports.orders_with_profit);
    case 'most_profitable_region':
      return reportToCsv(reports.most_profitable_region, REGION_PROFIT_COLUMNS);
    case 'most_common_ship_method':
      return reportToCsv(reports.most_common_ship_method, SHIP_METHOD_COLUMNS);
    case 'orders_by_category':
      return reportToCsv(reports.orders_by_category, CATEGORY_COUNT_COLUMNS);
  }
}

export async function GET() {
  return NextResponse.json({
    endpoint: '/api/reports',
    method: 'POST',
    reports: REPORT_NAMES,
    max_upload_bytes: getMaxUploadBytes(),
  });
}

export async function POST(request: Request) {
  const requested = new URL(request.url).searchParams.get('report');
  if (requested !== null && !isReportName(requested)) {
    return NextResponse.json(
      { success: false, error: `Unknown report: ${requested}` },
      { status: 400 }
    );
  }

  try {
    const upload = await readUpload(request);
    if (!upload || upload.text.trim() === '') {
      return NextResponse.json({ success: false, error: 'orders CSV is required' }, { status: 400 });
    }

    const orders = parseOrdersCsv(upload.text);
    console.log(`${LOG_PREFIX} Processing ${upload.name}: ${formatNumber(orders.rows.length)} records`);

    const reports = generateAnalyticsReports(orders);
    const summary = buildProcessingSummary(upload.name, orders, reports);

    for (const { region, total_profit } of reports.most_profitable_region) {
      console.log(`${LOG_PREFIX} Most profitable region: ${region} (${formatCurrency(total_profit)})`);
    }

    if (requested !== null) {
      return new NextResponse(renderReport(reports, requested), {
        status: 200,
        headers: { 'Content-Type': 'text/csv; charset=utf-8' },
      });
    }

    return NextResponse.json({ success: true, summary, reports });
  } catch (error: unknown) {
    if (error instanceof UploadTooLargeError) {
      console.warn(`${LOG_PREFIX} Upload rejected:`, error.message);
      return NextResponse.json({ success: false, error: error.message }, { status: 413 });
    }
    if (error instanceof SchemaError) {
      console.warn(`${LOG_PREFIX} Schema error:`, error.message);
      return NextResponse.json(
        { success: false, error: error.message, missing: error.missing },
        { status: 422 }
      );
    }
    if (error instanceof DatasetFormatError) {
      console.warn(`${LOG_PREFIX} Unreadable CSV:`, error.message);
      return NextResponse.json({ success: false, error: error.message }, { status: 400 });
    }

    console.error(`${LOG_PREFIX} Report generation failed:`, error);
    const message = error instanceof Error ? error.message : 'server error';
    return NextResponse.json({ success: false, error: message }, { status: 500 });
  }
}
