import { NextResponse } from 'next/server';
import { resolveRequestConfig } from '@/lib/config';
import { errorResponse } from '@/lib/http';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

export async function GET() {
  try {
    return NextResponse.json(await resolveRequestConfig({}));
  } catch (error) {
    return errorResponse(error, { route: 'config' });
  }
}
