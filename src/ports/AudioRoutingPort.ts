export interface AudioRoute {
  /** Sink-input index as reported by the sound server. */
  id: string;
  /** `media.name` of the stream. */
  label: string;
  /** `application.name` of the stream, when present. */
  application?: string;
}

export interface AudioRoutingPort {
  listRoutes(): Promise<AudioRoute[]>;
  /** Creates a null sink and returns the id of the module that owns it. */
  createNullSink(sinkName: string, description: string): Promise<string>;
  moveRoute(routeId: string, sinkName: string): Promise<void>;
  destroyModule(moduleId: string): Promise<void>;
}
