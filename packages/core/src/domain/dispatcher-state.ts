export enum DispatcherState {
	IDLE = "IDLE",
	RUNNING = "RUNNING",
	DRAINING = "DRAINING",
	STOPPED = "STOPPED",
}
