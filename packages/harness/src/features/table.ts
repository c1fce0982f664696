/**
 * Feature Table
 *
 * Declarative implementation of a graph's feature surface. Backends declare what
 * they support per capability class; anything undeclared reports false.
 */

import { UnknownFeatureError } from '../errors'
import type { GraphFeatures } from '../provider/types'
import { FEATURE_CLASSES, featureKey, isKnownFeature, type FeatureClass, type FeatureName } from './catalog'

export type FeatureDeclaration = {
  readonly [C in FeatureClass]?: Partial<Record<FeatureName<C>, boolean>>
}

export class FeatureTable implements GraphFeatures {
  private readonly values = new Map<string, boolean>()
  private readonly declarations: readonly FeatureDeclaration[]

  /**
   * Later declarations win over earlier ones.
   */
  constructor(...declarations: FeatureDeclaration[]) {
    this.declarations = declarations
    for (const declaration of declarations) {
      for (const featureClass of FEATURE_CLASSES) {
        const entries = declaration[featureClass]
        if (!entries) continue
        for (const [feature, supported] of Object.entries(entries)) {
          if (supported === undefined) continue
          if (!isKnownFeature(featureClass, feature)) {
            throw new UnknownFeatureError(featureClass, feature)
          }
          this.values.set(featureKey(featureClass, feature), supported)
        }
      }
    }
  }

  supports<C extends FeatureClass>(featureClass: C, feature: FeatureName<C>): boolean {
    if (!isKnownFeature(featureClass, feature)) {
      throw new UnknownFeatureError(featureClass, feature)
    }
    return this.values.get(featureKey(featureClass, feature)) ?? false
  }

  supportsTransactions(): boolean {
    return this.supports('graph', 'Transactions')
  }

  /**
   * Copy of this table with further declarations applied on top.
   */
  with(...changes: FeatureDeclaration[]): FeatureTable {
    return new FeatureTable(...this.declarations, ...changes)
  }
}
