import { useEffect, useRef, type ReactNode } from "react";
import { RuntimeContext, type EffectRuntime } from "../internal/runtimeContext";

export interface EffectProviderProps {
  readonly runtime: EffectRuntime;
  readonly children?: ReactNode;
}

export const EffectProvider = ({ runtime, children }: EffectProviderProps) => {
  const runtimeRef = useRef(runtime);
  const previousRuntimeRef = useRef<EffectRuntime | null>(null);

  useEffect(() => {
    runtimeRef.current = runtime;
    const previous = previousRuntimeRef.current;
    if (previous !== null && previous !== runtime) {
      void previous.dispose();
    }
    previousRuntimeRef.current = runtime;
  }, [runtime]);

  useEffect(
    () => () => {
      void runtimeRef.current.dispose();
    },
    [],
  );

  return <RuntimeContext.Provider value={runtime}>{children}</RuntimeContext.Provider>;
};
