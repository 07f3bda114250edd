import { z } from 'zod'
import {
  REACTION_TYPES,
  type CatalogEntry,
  type ReactionType,
  type RobotBehavior,
} from '../types/robot'

export interface BehaviorCatalogs {
  dances: Map<string, CatalogEntry>
  reactions: Map<ReactionType, CatalogEntry[]>
  bodyActions: Map<string, CatalogEntry>
}

const EMOTION_TAGS: Record<Exclude<ReactionType, 'HeadTouched'>, string> = {
  Happy: 'happy',
  Proud: 'proud',
  Laugh: 'laugh',
  Sad: 'sad',
}

const REACTION_POSTURE = 'Stand'
const BODY_ACTION_PACKAGE = 'dialog_move_arms'
const HEAD_TOUCHED_PACKAGE = 'dialog_touch'
const HEAD_TOUCHED_PATH = 'animations/head_touched'

// 置換は定義順に適用する（LArm → left arm の後に Up → Raise など）
const BODY_ACTION_WORDS: ReadonlyArray<[string, string]> = [
  ['LArm', 'left arm'],
  ['RArm', 'right arm'],
  ['BothArms', 'both arms'],
  ['Up', 'Raise '],
  ['Stretch', 'Stretch '],
]

const toEntry = (behavior: RobotBehavior, id = behavior.behaviorName): CatalogEntry => ({
  id,
  displayName: behavior.localizedName.en_US || id,
  metadata: {
    behaviorName: behavior.behaviorName,
    localizedName: { ...behavior.localizedName },
    description: behavior.description,
  },
})

export const describeBodyAction = (actionId: string): string =>
  BODY_ACTION_WORDS.reduce((text, [word, replacement]) => text.split(word).join(replacement), actionId)

const isReactionFor = (behavior: RobotBehavior, type: ReactionType): boolean => {
  if (type === 'HeadTouched') {
    return behavior.packageUuid === HEAD_TOUCHED_PACKAGE && behavior.behaviorPath === HEAD_TOUCHED_PATH
  }
  return (
    behavior.packageUuid === 'animations' &&
    behavior.behaviorPath.startsWith(`${REACTION_POSTURE}/Emotions`) &&
    behavior.tags.includes(EMOTION_TAGS[type])
  )
}

/**
 * インストール済みビヘイビアをダンス・リアクション・ボディアクションの3カタログに分類する。
 * 同じビヘイビアが複数のカタログに入ることもある。
 */
export const buildCatalogs = (behaviors: readonly RobotBehavior[]): BehaviorCatalogs => {
  const dances = new Map<string, CatalogEntry>()
  const bodyActions = new Map<string, CatalogEntry>()
  const reactions = new Map<ReactionType, CatalogEntry[]>(REACTION_TYPES.map((type) => [type, []]))

  for (const behavior of behaviors) {
    if (behavior.description.includes('dance')) {
      dances.set(behavior.behaviorName, toEntry(behavior))
    }

    for (const type of REACTION_TYPES) {
      if (isReactionFor(behavior, type)) {
        reactions.get(type)?.push(toEntry(behavior))
      }
    }

    if (behavior.packageUuid === BODY_ACTION_PACKAGE) {
      const actionId = behavior.behaviorPath.split('/').pop() ?? behavior.behaviorPath
      const description = describeBodyAction(actionId)
      bodyActions.set(actionId, {
        id: actionId,
        displayName: description,
        metadata: {
          behaviorName: behavior.behaviorName,
          localizedName: { en_US: description, fr_FR: '' },
          description,
        },
      })
    }
  }

  return { dances, reactions, bodyActions }
}

const localizedTextSchema = z.record(z.string())

const packageBehaviorSchema = z.object({
  path: z.string(),
  langToName: localizedTextSchema.default({}),
  langToDesc: localizedTextSchema.default({}),
  langToTags: z.record(z.array(z.string())).default({}),
})

const installedPackageSchema = z.object({
  uuid: z.string(),
  elems: z
    .object({
      names: localizedTextSchema.optional(),
      descriptions: localizedTextSchema.optional(),
      contents: z
        .object({
          behaviors: z.array(packageBehaviorSchema).optional(),
        })
        .optional(),
    })
    .optional(),
})

export const installedPackagesSchema = z.array(installedPackageSchema)

/**
 * ロボットのパッケージ一覧 (PackageManager.packages2) をビヘイビア一覧に変換する。
 * 名前・説明・ビヘイビア定義のいずれかが欠けたパッケージは読み飛ばす。
 */
export const parseInstalledPackages = (raw: unknown): RobotBehavior[] => {
  const packages = installedPackagesSchema.parse(raw)
  const behaviors: RobotBehavior[] = []

  for (const pkg of packages) {
    const names = pkg.elems?.names
    const descriptions = pkg.elems?.descriptions
    const packageBehaviors = pkg.elems?.contents?.behaviors
    if (!names || !descriptions || !packageBehaviors) {
      continue
    }

    for (const entry of packageBehaviors) {
      const isRoot = entry.path === '.'
      const nameSource = isRoot ? names : entry.langToName
      const nameEn = nameSource.en_US ?? ''
      behaviors.push({
        packageUuid: pkg.uuid,
        behaviorPath: entry.path,
        behaviorName: isRoot ? pkg.uuid : `${pkg.uuid}/${entry.path}`,
        localizedName: { en_US: nameEn, fr_FR: nameSource.fr_FR ?? nameEn },
        description: (isRoot ? descriptions.en_US : entry.langToDesc.en_US) ?? '',
        tags: entry.langToTags.en_US ?? [],
      })
    }
  }

  return behaviors
}
