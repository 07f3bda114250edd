import { z } from 'zod'
import type { RobotSession } from '../services/robot-session'
import { errorMessage } from '../utils/errors'
import { logger } from '../utils/logger'
import { breathingChainSchema, engagementModeSchema, trackingModeSchema } from '../api/schema'

type JsonSchemaProperty = {
  type: 'string' | 'boolean'
  description: string
  enum?: readonly string[]
}

export type ToolDefinition = {
  name: string
  description: string
  inputSchema: {
    type: 'object'
    properties: Record<string, JsonSchemaProperty>
    required?: string[]
  }
}

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>
  isError?: boolean
}

interface Tool {
  definition: ToolDefinition
  run(session: RobotSession, args: unknown): Promise<string>
}

const text = (description: string): JsonSchemaProperty => ({ type: 'string', description })

const defineTool = <P>(
  definition: ToolDefinition,
  schema: z.ZodType<P, z.ZodTypeDef, unknown>,
  run: (session: RobotSession, params: P) => Promise<string>
): Tool => ({
  definition,
  async run(session, args) {
    const parsed = schema.safeParse(args ?? {})
    if (!parsed.success) {
      const issue = parsed.error.issues[0]
      throw new Error(`Invalid argument '${issue.path.join('.') || 'arguments'}': ${issue.message}`)
    }
    return run(session, parsed.data)
  },
})

const noArgs = (name: string, description: string): ToolDefinition => ({
  name,
  description,
  inputSchema: { type: 'object', properties: {} },
})

const withArgs = (
  name: string,
  description: string,
  properties: Record<string, JsonSchemaProperty>
): ToolDefinition => ({
  name,
  description,
  inputSchema: { type: 'object', properties, required: Object.keys(properties) },
})

const noArgsSchema = z.object({})

const TOOLS: readonly Tool[] = [
  defineTool(
    withArgs('set_tts_language', 'Change the language used by the robot text to speech.', {
      language: text('Language name, for example English or French'),
    }),
    z.object({ language: z.string().min(1) }),
    async (session, { language }) => {
      await session.setTtsLanguage(language)
      return `Robot switched language to ${language}`
    }
  ),
  defineTool(
    withArgs('say', 'Make the robot say a text, with animated gestures.', { text: text('Text to say') }),
    z.object({ text: z.string() }),
    async (session, params) => {
      await session.say(params.text)
      return `Robot said ${params.text}`
    }
  ),
  defineTool(noArgs('stop_say', 'Stop any speech in progress.'), noArgsSchema, async (session) => {
    await session.stopSay()
    return 'Robot stopped speaking'
  }),
  defineTool(noArgs('wake_up', 'Enable the robot motors and go to an initial posture.'), noArgsSchema, async (session) => {
    await session.wakeUp()
    return 'Robot motors are enabled'
  }),
  defineTool(noArgs('rest', 'Go to a relaxed posture and disable the robot motors.'), noArgsSchema, async (session) => {
    await session.rest()
    return 'Robot motors are disabled'
  }),
  defineTool(noArgs('stand_up', 'Make the robot stand up.'), noArgsSchema, async (session) => {
    await session.standUp()
    return 'Robot stood up'
  }),
  defineTool(noArgs('sit_down', 'Make the robot sit down.'), noArgsSchema, async (session) => {
    await session.sitDown()
    return 'Robot sat down'
  }),
  defineTool(
    withArgs('change_eyes_color', 'Change the color of the robot eyes.', {
      color: text('Color name (white, red, green, blue, yellow, magenta, cyan)'),
    }),
    z.object({ color: z.string().min(1) }),
    async (session, { color }) => {
      await session.changeEyesColor(color)
      return `Robot eyes are now ${color}`
    }
  ),
  defineTool(
    withArgs('set_basic_awareness_state', 'Enable or disable the robot basic awareness (looking at people).', {
      enabled: { type: 'boolean', description: 'Whether basic awareness is enabled' },
      engagement_mode: { type: 'string', description: 'Engagement mode', enum: engagementModeSchema.options },
      tracking_mode: { type: 'string', description: 'Tracking mode', enum: trackingModeSchema.options },
    }),
    z
      .object({ enabled: z.boolean(), engagement_mode: engagementModeSchema, tracking_mode: trackingModeSchema })
      .transform(({ enabled, engagement_mode, tracking_mode }) => ({
        enabled,
        engagementMode: engagement_mode,
        trackingMode: tracking_mode,
      })),
    async (session, { enabled, engagementMode, trackingMode }) => {
      await session.setBasicAwarenessState(enabled, engagementMode, trackingMode)
      return `Basic awareness ${enabled ? 'enabled' : 'disabled'} (${engagementMode}, ${trackingMode})`
    }
  ),
  defineTool(
    withArgs('set_breathing_enabled', 'Enable or disable the idle breathing animation on a body chain.', {
      enabled: { type: 'boolean', description: 'Whether breathing is enabled' },
      chain_name: { type: 'string', description: 'Body chain', enum: breathingChainSchema.options },
    }),
    z.object({ enabled: z.boolean(), chain_name: breathingChainSchema }),
    async (session, { enabled, chain_name }) => {
      await session.setBreathingEnabled(enabled, chain_name)
      return `Breathing ${enabled ? 'enabled' : 'disabled'} on ${chain_name}`
    }
  ),
  defineTool(
    noArgs(
      'get_dance_behaviors',
      'Get the list of available dances. Call it before using the dance tool. Returns a JSON array.'
    ),
    noArgsSchema,
    async (session) => JSON.stringify(await session.getDanceBehaviors())
  ),
  defineTool(
    withArgs('dance', 'Make the robot dance. Waits until the dance is finished.', {
      dance_id: text('Id of a dance returned by get_dance_behaviors'),
    }),
    z.object({ dance_id: z.string().min(1) }),
    async (session, { dance_id }) => {
      await session.dance(dance_id)
      return `Robot has danced the dance with id '${dance_id}'`
    }
  ),
  defineTool(
    withArgs('stop_dance', 'Stop a running dance.', { dance_id: text('Id of the dance to stop') }),
    z.object({ dance_id: z.string().min(1) }),
    async (session, { dance_id }) => {
      await session.stopDance(dance_id)
      return `Dance '${dance_id}' stopped`
    }
  ),
  defineTool(
    noArgs(
      'get_expressive_reaction_types',
      'Get the list of reaction types the robot can express. Returns a JSON array.'
    ),
    noArgsSchema,
    async (session) => JSON.stringify(await session.getExpressiveReactionTypes())
  ),
  defineTool(
    withArgs('expressive_reaction', 'Make the robot react to an emotion or a situation.', {
      type: text('Reaction type returned by get_expressive_reaction_types'),
    }),
    z.object({ type: z.string().min(1) }),
    async (session, { type }) => {
      await session.expressiveReaction(type)
      return `Robot has reacted for type '${type}'`
    }
  ),
  defineTool(
    withArgs('stop_expressive_reaction', 'Stop a running reaction.', { type: text('Reaction type to stop') }),
    z.object({ type: z.string().min(1) }),
    async (session, { type }) => {
      await session.stopExpressiveReaction(type)
      return `Reaction '${type}' stopped`
    }
  ),
  defineTool(
    noArgs(
      'get_body_action_behaviors',
      'Get the list of available body actions. Call it before using the body_action tool. Returns a JSON array.'
    ),
    noArgsSchema,
    async (session) => JSON.stringify(await session.getBodyActionBehaviors())
  ),
  defineTool(
    withArgs('body_action', 'Make the robot perform a body action.', {
      id: text('Id of a body action returned by get_body_action_behaviors'),
    }),
    z.object({ id: z.string().min(1) }),
    async (session, { id }) => {
      await session.bodyAction(id)
      return `Robot has performed the body action with id '${id}'`
    }
  ),
  defineTool(
    withArgs('stop_body_action', 'Stop a running body action.', { id: text('Id of the body action to stop') }),
    z.object({ id: z.string().min(1) }),
    async (session, { id }) => {
      await session.stopBodyAction(id)
      return `Body action '${id}' stopped`
    }
  ),
]

const TOOL_MAP = new Map(TOOLS.map((tool) => [tool.definition.name, tool]))

export const TOOL_DEFINITIONS: ToolDefinition[] = TOOLS.map((tool) => tool.definition)

const failure = (message: string): ToolResult => ({ content: [{ type: 'text', text: message }], isError: true })

/**
 * ツール呼び出しを実行する。失敗はプロトコルエラーにせず isError の結果として返す。
 * セッションが切れていれば呼び出しの前に再接続を試みる。
 */
export const callTool = async (session: RobotSession, name: string, args: unknown): Promise<ToolResult> => {
  const tool = TOOL_MAP.get(name)
  if (!tool) {
    return failure(`Unknown tool '${name}'`)
  }
  try {
    if (!session.isConnected) {
      await session.connect()
    }
    const message = await tool.run(session, args)
    return { content: [{ type: 'text', text: message }] }
  } catch (err) {
    logger.warn({ err, tool: name }, 'Tool call failed')
    return failure(`${name} failed: ${errorMessage(err)}`)
  }
}
