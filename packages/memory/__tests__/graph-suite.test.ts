import { expect } from "vitest"
import {
  commitIfSupported,
  createLogger,
  edgeByNames,
  feature,
  requirementSet,
  vertexIdByName,
} from "@graphcheck/harness"
import { defineGraphSuite } from "@graphcheck/harness/vitest"
import { MemoryGraphProvider } from "../src"

const logger = createLogger({ level: "silent" })

defineGraphSuite({ name: "memory traversal", provider: new MemoryGraphProvider(), logger }, (suite) => {
  suite.test({ name: "follows songs to their writers", fixture: "grateful-dead" }, async (graph) => {
    const tide = await vertexIdByName(graph, "Morning Tide")
    const writers = graph.outEdges(tide, "writtenBy").map((edge) => graph.vertex(edge.inId)?.properties.name)

    expect(writers).toEqual(["Hunter"])
  })

  suite.test(
    { name: "adds a vertex and commits", requirements: [requirementSet("SIMPLE"), feature("graph", "Transactions")] },
    async (graph) => {
      graph.addVertex("artist", { name: "Lesh" })

      await commitIfSupported(graph, (g) => {
        expect(g.findVertices("name", "Lesh")).toHaveLength(1)
      })
      expect(graph.tx().isOpen()).toBe(false)
    },
  )

  suite.test({ name: "weights setlist transitions", fixture: "grateful-dead" }, async (graph) => {
    const edge = await edgeByNames(graph, "River Lantern", "followedBy", "Copper Road")
    expect(edge.properties).toEqual({ weight: 3 })
  })
})

defineGraphSuite(
  { name: "memory without transactions", provider: new MemoryGraphProvider({ features: { graph: { Transactions: false } } }), logger },
  (suite) => {
    suite.test({ name: "needs transactions", requirements: [feature("graph", "Transactions")] }, () => {
      throw new Error("a gated test must not run")
    })

    suite.test({ name: "commits nothing", requirements: [requirementSet("SIMPLE")] }, async (graph) => {
      graph.addVertex("artist", { name: "Lesh" })
      let checks = 0
      await commitIfSupported(graph, () => {
        checks++
      })
      expect(checks).toBe(1)
      expect(graph.stats().vertices).toBe(1)
    })
  },
)
