import { test, expect } from '@playwright/test';
import { GET, POST } from '@/app/api/reports/route';
import { REPORT_NAMES } from '@/lib/constants/reports';
import { readOrdersCsv } from '../helpers/orders';

const API_URL = 'http://localhost:3000/api/reports';

function csvRequest(body: string, query = ''): Request {
  return new Request(`${API_URL}${query}`, {
    method: 'POST',
    headers: { 'content-type': 'text/csv' },
    body,
  });
}

test.describe('Reports API', () => {
  test('GET /api/reports describes the endpoint', async () => {
    const response = await GET();

    expect(response.status).toBe(200);
    const data = await response.json();
    expect(data.endpoint).toBe('/api/reports');
    expect(data.method).toBe('POST');
    expect(data.reports).toEqual(REPORT_NAMES);
  });

  test('POST with a CSV body returns the summary and every report', async () => {
    const response = await POST(csvRequest(readOrdersCsv()));

    expect(response.status).toBe(200);
    const data = await response.json();
    expect(data.success).toBe(true);
    expect(data.summary.input_file).toBe('request-body.csv');
    expect(data.summary.records_processed).toBe(4);
    expect(data.summary.report_rows).toEqual({
      most_profitable_region: 1,
      most_common_ship_method: 4,
      orders_by_category: 4,
      orders_with_profit: 4,
    });
    expect(data.reports.most_profitable_region[0].region).toBe('Central');
    expect(data.reports.most_profitable_region[0].total_profit).toBeCloseTo(803.0, 6);
  });

  test('POST with a multipart upload uses the file name', async () => {
    const form = new FormData();
    form.append('file', new Blob([readOrdersCsv()], { type: 'text/csv' }), 'orders.csv');

    const response = await POST(new Request(API_URL, { method: 'POST', body: form }));

    expect(response.status).toBe(200);
    const data = await response.json();
    expect(data.summary.input_file).toBe('orders.csv');
  });

  test('multipart upload without a file field is rejected', async () => {
    const form = new FormData();
    form.append('notes', 'no file here');

    const response = await POST(new Request(API_URL, { method: 'POST', body: form }));

    expect(response.status).toBe(400);
  });

  test('report query returns that report as CSV', async () => {
    const response = await POST(csvRequest(readOrdersCsv(), '?report=most_common_ship_method'));

    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toContain('text/csv');
    expect(await response.text()).toBe(
      'Category,Ship Mode,Count\n' +
      'Furniture,First Class,1\n' +
      'Furniture,Same Day,1\n' +
      'Furniture,Standard Class,1\n' +
      'Office Supplies,Standard Class,1\n'
    );
  });

  test('category report CSV lists every pair', async () => {
    const response = await POST(csvRequest(readOrdersCsv(), '?report=orders_by_category'));

    expect(await response.text()).toBe(
      'Category,Sub Category,order_count\n' +
      'Furniture,Bookcases,1\n' +
      'Furniture,Chairs,1\n' +
      'Furniture,Tables,1\n' +
      'Office Supplies,Labels,1\n'
    );
  });

  test('unknown report names are rejected', async () => {
    const response = await POST(csvRequest(readOrdersCsv(), '?report=best_customers'));

    expect(response.status).toBe(400);
    const data = await response.json();
    expect(data.error).toBe('Unknown report: best_customers');
  });

  test('missing required columns return 422 with the column names', async () => {
    const csv = 'Region,cost price,Quantity,Discount Percent,Category,Sub Category,Ship Mode\n' +
      'West,10,1,0,Furniture,Chairs,Ground\n';

    const response = await POST(csvRequest(csv));

    expect(response.status).toBe(422);
    const data = await response.json();
    expect(data.success).toBe(false);
    expect(data.missing).toEqual(['List Price']);
  });

  test('an empty body is rejected', async () => {
    const response = await POST(csvRequest('  \n'));

    expect(response.status).toBe(400);
    const data = await response.json();
    expect(data.error).toBe('orders CSV is required');
  });

  test('malformed CSV is rejected', async () => {
    const response = await POST(csvRequest('Region,Category\nWest,Furniture,Extra\n'));

    expect(response.status).toBe(400);
    const data = await response.json();
    expect(data.success).toBe(false);
    expect(data.error).toContain('(line 2)');
  });

  test('a short row is read and checked against the required columns', async () => {
    const response = await POST(csvRequest('Region,Category\nWest\n'));

    expect(response.status).toBe(422);
    const data = await response.json();
    expect(data.missing).toEqual(['List Price', 'cost price', 'Quantity', 'Discount Percent']);
  });

  test('a malformed multipart body is rejected', async () => {
    const response = await POST(new Request(API_URL, {
      method: 'POST',
      headers: { 'content-type': 'multipart/form-data; boundary=zzz' },
      body: 'garbage',
    }));

    expect(response.status).toBe(400);
    const data = await response.json();
    expect(data.success).toBe(false);
    expect(data.error).toContain('Could not read multipart body');
  });
});

test.describe('Reports API upload limit', () => {
  const previous = process.env.REPORTS_MAX_UPLOAD_BYTES;

  test.beforeEach(() => {
    process.env.REPORTS_MAX_UPLOAD_BYTES = '64';
  });

  test.afterEach(() => {
    if (previous === undefined) {
      delete process.env.REPORTS_MAX_UPLOAD_BYTES;
    } else {
      process.env.REPORTS_MAX_UPLOAD_BYTES = previous;
    }
  });

  test('GET reports the configured limit', async () => {
    const data = await (await GET()).json();

    expect(data.max_upload_bytes).toBe(64);
  });

  test('a raw body over the limit returns 413', async () => {
    const response = await POST(csvRequest(readOrdersCsv()));

    expect(response.status).toBe(413);
    const data = await response.json();
    expect(data.success).toBe(false);
    expect(data.error).toBe('file too large (limit 64 bytes)');
  });

  test('a multipart file over the limit returns 413', async () => {
    const form = new FormData();
    form.append('file', new Blob([readOrdersCsv()], { type: 'text/csv' }), 'orders.csv');

    const response = await POST(new Request(API_URL, { method: 'POST', body: form }));

    expect(response.status).toBe(413);
  });

  test('a body within the limit reaches the schema check', async () => {
    const response = await POST(csvRequest('Region,Category\n'));

    expect(response.status).toBe(422);
  });
});
