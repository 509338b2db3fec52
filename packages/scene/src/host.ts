/**
 * Host assembly
 */

import { createNodeTimers, type EvaluationService, type NodeTimerFacility, type SyncHost } from '@curvelink/core';
import { ControlNetEvaluator } from './evaluator.js';
import { YjsScene } from './YjsScene.js';

export interface SceneHost extends SyncHost {
  scene: YjsScene;
  resources: YjsScene;
  events: YjsScene;
  timers: NodeTimerFacility;
}

export interface SceneHostOptions {
  evaluator?: EvaluationService;
  timers?: NodeTimerFacility;
}

/**
 * Everything the sync engine needs, backed by one YjsScene
 */
export function createSceneHost(scene: YjsScene = new YjsScene(), options: SceneHostOptions = {}): SceneHost {
  return {
    scene,
    resources: scene,
    events: scene,
    evaluator: options.evaluator ?? new ControlNetEvaluator(),
    timers: options.timers ?? createNodeTimers(),
  };
}
