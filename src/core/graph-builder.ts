import debug from "debug";
import graphlib, { type Graph as RecipeGraph } from "graphlib";
import { DependencyCycleError, UnknownRecipeError } from "../errors";
import type { Recipe } from "../types";
import type { RecipeRegistry } from "./registry";

const { Graph, alg } = graphlib;

const log = debug("ladle:graph");

/**
 * Directed graph of recipe references: an edge goes from a recipe to each
 * recipe it depends on or invokes from its body. Built once at load time so
 * that unknown targets and cycles are rejected before anything runs.
 */
export class GraphBuilder {
  buildGraph(registry: RecipeRegistry): RecipeGraph {
    const graph = new Graph();

    log("=== Starting graph build ===");

    for (const recipe of registry.list()) {
      graph.setNode(recipe.name);
    }

    for (const recipe of registry.list()) {
      for (const target of this.references(recipe)) {
        if (!registry.has(target)) {
          throw new UnknownRecipeError(target, recipe.name);
        }
        const resolved = registry.resolve(target).name;
        log(`Adding edge from ${recipe.name} to ${resolved}`);
        graph.setEdge(recipe.name, resolved);
      }
    }

    log("Nodes:", graph.nodes());
    log("Edges:", graph.edges());

    this.validateGraph(graph);
    return graph;
  }

  /**
   * Validate graph for cycles (using graphlib's built-in validation)
   */
  validateGraph(graph: RecipeGraph): void {
    if (!alg.isAcyclic(graph)) {
      const cycles = alg.findCycles(graph);
      log("Cycles:", cycles);
      throw new DependencyCycleError(cycles);
    }
  }

  private references(recipe: Recipe): string[] {
    const targets = recipe.dependencies.map((dependency) => dependency.recipe);
    for (const line of recipe.body) {
      if (line.kind === "invocation") {
        targets.push(line.recipe);
      }
    }
    return targets;
  }
}
