/**
 * Resolves true when work settles within timeoutMs, false otherwise. Rejections count as
 * settled; callers that care about them handle them on `work` itself.
 */
export async function settlesWithin(work: Promise<unknown>, timeoutMs: number): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<false>((resolve) => {
        timer = setTimeout(() => resolve(false), timeoutMs);
        timer.unref();
    });
    const settled = work.then(
        () => true,
        () => true
    );
    try {
        return await Promise.race([settled, expired]);
    } finally {
        clearTimeout(timer);
    }
}
