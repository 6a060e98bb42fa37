import { ProviderPage } from './types';

export const SWEEP_PAGE_SIZE = 100;

/**
 * Requests consecutive pages until the provider reports there is no next
 * page, and returns every item in provider order. There is no iteration cap:
 * callers bound the sweep with `signal`, which is checked before each request.
 */
export async function sweepPages<T>(
    fetchPage: (page: number, perPage: number) => Promise<ProviderPage<T>>,
    signal?: AbortSignal,
): Promise<T[]> {
    const items: T[] = [];

    for (let page = 0; ; page++) {
        signal?.throwIfAborted();
        const res = await fetchPage(page, SWEEP_PAGE_SIZE);
        items.push(...res.items);

        if (!res.hasNext) return items;
    }
}
