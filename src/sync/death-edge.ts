/**
 * Death-Edge Dispatcher (replica only)
 *
 * Fires the local death callback on the first alive -> dead transition seen
 * in the snapshot stream, and never again until reset. The callback is held
 * here rather than looked up on the Behavior Controller's enabled state,
 * because the death handling itself is what disables the controller.
 */
export class DeathEdgeDispatcher {
    private fired: boolean = false;

    constructor(private readonly onDeath: () => void) {}

    get hasFired(): boolean {
        return this.fired;
    }

    /**
     * @returns true if this call fired the death callback
     */
    onSnapshotApplied(previousIsDead: boolean, newIsDead: boolean): boolean {
        if (this.fired) return false;
        if (previousIsDead || !newIsDead) return false;

        this.fired = true;
        this.onDeath();
        return true;
    }

    /** Re-arm for pooled reuse */
    reset(): void {
        this.fired = false;
    }
}
