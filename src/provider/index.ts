export { EffectProvider, type EffectProviderProps } from "./EffectProvider";
