import { NextResponse } from 'next/server';
import type { GrowthUpdate } from '@/types/growth';
import { parseGrowthEvent } from '@/lib/growth-events';
import { getGrowthSession } from '@/lib/growth-session';
import { logger } from '@/lib/logger';

// Records live in blob storage, so every request must reach the handler
export const dynamic = 'force-dynamic';

type ErrorBody = { error: string };

export async function GET(): Promise<NextResponse<GrowthUpdate | ErrorBody>> {
  try {
    const session = await getGrowthSession();
    const update = await session.dispatch({ type: 'refresh' });
    return NextResponse.json(update);
  } catch (error) {
    logger.error('api', 'Failed to read growth records', undefined, { error });
    return NextResponse.json({ error: 'Failed to read growth records' }, { status: 500 });
  }
}

export async function POST(request: Request): Promise<NextResponse<GrowthUpdate | ErrorBody>> {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    return NextResponse.json({ error: 'Request body must be JSON' }, { status: 400 });
  }

  const parsed = parseGrowthEvent(body);
  if (!parsed.success) {
    return NextResponse.json({ error: parsed.error }, { status: 400 });
  }

  try {
    const session = await getGrowthSession();
    const update = await session.dispatch(parsed.event);
    return NextResponse.json(update);
  } catch (error) {
    logger.error('api', 'Failed to update growth records', { event: parsed.event.type }, { error });
    return NextResponse.json({ error: 'Failed to update growth records' }, { status: 500 });
  }
}
