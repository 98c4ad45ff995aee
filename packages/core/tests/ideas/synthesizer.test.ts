import { describe, it, expect, vi, afterEach } from 'vitest'
import {
  IdeaSynthesizer,
  composeTitle,
  deriveFeatures,
  estimateTimeline,
  identifyChallenges,
  roundHalfEven,
  suggestDemos,
  synthesize,
  titleCase,
} from '../../src/ideas/synthesizer.js'
import { IdeaSchema } from '../../src/ideas/schemas.js'
import { getDefaultCatalog } from '../../src/catalog/catalog.js'
import { firstPick, lastPick, miniCatalog } from '../helpers.js'

const GENERIC_DEMOS = [
  'Live user interface walkthrough',
  'Real-time feature demonstration',
  'Before/after comparison scenarios',
  'User testimonial videos',
  'Performance metrics visualization',
]

const BASELINE_FEATURES = [
  'User authentication and profiles',
  'Real-time data processing',
  'Mobile-responsive design',
  'Analytics dashboard',
]

describe('IdeaSynthesizer with first-entry picks', () => {
  const synthesizer = new IdeaSynthesizer(getDefaultCatalog(), { random: firstPick })
  const idea = synthesizer.synthesize('Health Week', ['healthcare'], ['time', 'team_size'], 0)

  it('picks the first entry of every table', () => {
    expect(idea.domain).toBe('healthcare')
    expect(idea.problem).toBe('medication adherence')
    expect(idea.targetAudience).toBe('patients')
    expect(idea.technologyCategory).toBe('ai_powered')
    expect(idea.technologies).toEqual(['machine_learning', 'nlp', 'computer_vision'])
    expect(idea.innovationPattern).toBe('gamification')
    expect(idea.templateType).toBe('problem_solution')
  })

  it('composes the title and description', () => {
    expect(idea.title).toBe('Medication Adherence Assistant')
    expect(idea.description).toBe(
      'A cutting-edge solution that addresses medication adherence for patients through content_generation. ' +
        'The platform leverages machine_learning, nlp and incorporates gamification to create an engaging user experience. ' +
        'Specifically designed for the Health Week challenge, this solution aims to make a significant impact in the target domain.',
    )
  })

  it('derives features in baseline, problem, technology, innovation order capped at 8', () => {
    expect(idea.features).toEqual([
      ...BASELINE_FEATURES,
      'Pill reminder system',
      'Dosage tracking',
      'Doctor notifications',
      'Predictive recommendations',
    ])
  })

  it('estimates the timeline from per-technology hours plus setup', () => {
    expect(idea.mvpTimeline).toEqual({
      totalHours: 45,
      daysEstimate: 5,
      phases: {
        setup: '4 hours',
        backend: '18 hours',
        frontend: '14 hours',
        integration: '9 hours',
        testing: '4 hours',
      },
    })
  })

  it('assesses impact and market from domain tables', () => {
    expect(idea.potentialImpact).toEqual({
      socialImpact: 'high',
      economicImpact: 'high',
      technicalImpact: 'medium',
      targetUsers: '1000+ patients',
      scalability: 'medium',
    })
    expect(idea.marketPotential).toEqual({
      marketSize: 'Large ($4.5T global market)',
      competition: 'Moderate',
      monetization: ['Subscription model', 'Freemium', 'B2B licensing'],
      growthPotential: 'Medium',
    })
  })

  it('lists technology challenges before constraint challenges, capped at 5', () => {
    expect(idea.technicalChallenges).toEqual([
      'Data quality and quantity',
      'Model training time',
      'Image processing performance',
      'Lighting conditions',
      'Limited development time',
    ])
  })

  it('suggests generic demos then problem demos, capped at 6', () => {
    expect(idea.demoSuggestions).toEqual([...GENERIC_DEMOS, 'Mock pill reminder demonstration'])
  })

  it('leaves scores at zero', () => {
    expect(idea.feasibilityScore).toBe(0)
    expect(idea.innovationScore).toBe(0)
    expect(idea.overallScore).toBe(0)
  })

  it('produces a record that passes IdeaSchema', () => {
    expect(IdeaSchema.safeParse(idea).success).toBe(true)
  })
})

describe('IdeaSynthesizer with last-entry picks', () => {
  const synthesizer = new IdeaSynthesizer(getDefaultCatalog(), { random: lastPick })

  it('draws domains in catalog order from the requested set', () => {
    const idea = synthesizer.synthesize('', ['healthcare', 'finance'], [], 0)
    expect(idea.domain).toBe('finance')
    expect(idea.problem).toBe('small business accounting')
    expect(idea.targetAudience).toBe('investors')
    expect(idea.technologyCategory).toBe('iot_connected')
    expect(idea.technologies).toEqual(['sensors', 'raspberry_pi', 'arduino'])
    expect(idea.innovationPattern).toBe('social_impact')
    expect(idea.templateType).toBe('marketplace')
    expect(idea.title).toBe('AI-Powered Small Business Accounting Solution')
  })

  it('keeps audience and technology tags raw in the description', () => {
    const idea = synthesizer.synthesize('', ['finance'], [], 0)
    expect(idea.targetAudience).toBe('investors')
    expect(idea.description).toContain('leverages sensors, raspberry_pi and incorporates social impact')
  })

  it('omits the theme sentence for an empty theme', () => {
    const idea = synthesizer.synthesize('', ['finance'], [], 0)
    expect(idea.description).toBe(
      'A cutting-edge solution that addresses small business accounting for investors through agriculture. ' +
        'The platform leverages sensors, raspberry_pi and incorporates social impact to create an engaging user experience.',
    )
  })

  it('falls back to default tables for unlisted problems and technologies', () => {
    const idea = synthesizer.synthesize('', ['finance'], [], 0)
    expect(idea.features).toEqual(BASELINE_FEATURES)
    expect(idea.mvpTimeline.totalHours).toBe(34)
    expect(idea.mvpTimeline.daysEstimate).toBe(4)
    expect(idea.mvpTimeline.phases.backend).toBe('14 hours')
    expect(idea.mvpTimeline.phases.testing).toBe('3 hours')
    expect(idea.technicalChallenges).toEqual([])
    expect(idea.demoSuggestions).toEqual(GENERIC_DEMOS)
  })

  it('ignores the order of the requested domains', () => {
    const a = synthesizer.synthesize('x', ['healthcare', 'finance'], [], 3)
    const b = synthesizer.synthesize('x', ['finance', 'healthcare'], [], 3)
    expect(b).toEqual(a)
  })

  it('treats unknown domain ids as absent', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const idea = synthesizer.synthesize('', ['atlantis'], [], 0)
    expect(idea.domain).toBe('productivity')
    expect(warn).not.toHaveBeenCalled()
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })
})

describe('seeded synthesis', () => {
  it('is deterministic for the same inputs', () => {
    const a = synthesize('Climate Hack', ['environment'], ['time'], 2)
    const b = synthesize('Climate Hack', ['environment'], ['time'], 2)
    expect(b).toEqual(a)
  })

  it('stays inside the requested domains', () => {
    for (let index = 0; index < 20; index++) {
      const idea = synthesize('Money', ['finance', 'education'], [], index)
      expect(['finance', 'education']).toContain(idea.domain)
    }
  })

  it('keeps every list within its cap', () => {
    for (let index = 0; index < 20; index++) {
      const idea = synthesize('AI for Good', [], ['time', 'team_size'], index)
      expect(idea.technologies.length).toBeLessThanOrEqual(3)
      expect(idea.features.length).toBeLessThanOrEqual(8)
      expect(idea.technicalChallenges.length).toBeLessThanOrEqual(5)
      expect(idea.demoSuggestions.length).toBeLessThanOrEqual(6)
    }
  })
})

describe('synthesis over an injected catalog', () => {
  it('uses only that catalog', () => {
    const synthesizer = new IdeaSynthesizer(miniCatalog(), { random: firstPick })
    const idea = synthesizer.synthesize('Orbit watch', ['space'], ['time'], 0)

    expect(idea.title).toBe('Orbital Debris Radar')
    expect(idea.technologies).toEqual(['react', 'fastapi'])
    expect(idea.features).toEqual(['Login', 'Voice commands'])
    expect(idea.mvpTimeline).toEqual({
      totalHours: 24,
      daysEstimate: 3,
      phases: { setup: '4 hours', backend: '10 hours', frontend: '7 hours', integration: '5 hours', testing: '2 hours' },
    })
    expect(idea.technicalChallenges).toEqual(['Tight deadline'])
    expect(idea.demoSuggestions).toEqual(['Walkthrough'])
    expect(idea.potentialImpact).toEqual({
      socialImpact: 'medium',
      economicImpact: 'medium',
      technicalImpact: 'medium',
      targetUsers: '1000+ operators',
      scalability: 'medium',
    })
    expect(idea.marketPotential).toEqual({
      marketSize: 'Medium',
      competition: 'Low',
      monetization: ['Donations'],
      growthPotential: 'Medium',
    })
  })
})

describe('derivation helpers', () => {
  const catalog = getDefaultCatalog()

  it('titleCase humanizes tags', () => {
    expect(titleCase('small_businesses')).toBe('Small Businesses')
    expect(titleCase('MEDICATION adherence')).toBe('Medication Adherence')
  })

  it('composeTitle fills both placeholders', () => {
    expect(composeTitle('{innovation} for {problem}', 'fraud detection', 'ai_personalization')).toBe(
      'Ai Personalization for Fraud Detection',
    )
  })

  it('roundHalfEven sends exact halves to the even neighbour', () => {
    expect(roundHalfEven(4.5)).toBe(4)
    expect(roundHalfEven(13.5)).toBe(14)
    expect(roundHalfEven(2.5)).toBe(2)
    expect(roundHalfEven(6.4)).toBe(6)
    expect(roundHalfEven(1.6)).toBe(2)
  })

  it('estimateTimeline splits 45 hours with halves rounded to even', () => {
    expect(estimateTimeline(catalog, ['machine_learning', 'nlp', 'computer_vision'])).toEqual({
      totalHours: 45,
      daysEstimate: 5,
      phases: { setup: '4 hours', backend: '18 hours', frontend: '14 hours', integration: '9 hours', testing: '4 hours' },
    })
  })

  it('estimateTimeline rounds phase hours', () => {
    expect(estimateTimeline(catalog, ['fastapi'])).toEqual({
      totalHours: 16,
      daysEstimate: 2,
      phases: { setup: '4 hours', backend: '6 hours', frontend: '5 hours', integration: '3 hours', testing: '2 hours' },
    })
  })

  it('identifyChallenges takes two per technology and truncates to 5', () => {
    expect(identifyChallenges(catalog, ['machine_learning', 'blockchain', 'computer_vision'], ['time', 'team_size'])).toEqual([
      'Data quality and quantity',
      'Model training time',
      'Transaction costs',
      'Scalability issues',
      'Image processing performance',
    ])
  })

  it('deriveFeatures uses only the first two technologies', () => {
    expect(deriveFeatures(catalog, 'time management', ['computer_vision', 'machine_learning', 'blockchain'], 'voice_interface')).toEqual([
      ...BASELINE_FEATURES,
      'Task prioritization',
      'Calendar integration',
      'Productivity metrics',
      'Image recognition',
    ])
  })

  it('suggestDemos appends problem demos', () => {
    expect(suggestDemos(catalog, 'budgeting and savings')).toEqual([...GENERIC_DEMOS, 'Expense tracking demo'])
  })
})
