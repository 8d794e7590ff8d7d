/**
 * Stage 1 Similarity 基础用法：纯函数，不调用任何后端。
 */

import {
  distance,
  DISTANCE_KERNELS,
  MetricNotImplementedError,
  similarity,
  SIMILARITY_METRICS,
} from "../src/index.js";

function main() {
  console.log("\n========== Stage 1 知识点 ==========");
  console.log("1. similarity(v, o | os, metric)：cosine / euclidean / jaccard 等，集合输入逐个返回。");
  console.log("2. distance(v, o | os, kernel)：gaussian / rbf / frechet / mmd 等核函数。");
  console.log("3. 未知名称抛 MetricNotImplementedError，并列出可用名称。");
  console.log("====================================\n");

  const query = [1, 0, 1];
  const candidates = [
    [1, 0, 1],
    [0, 1, 0],
    [1, 1, 1],
  ];

  console.log("metrics:", SIMILARITY_METRICS.join(", "));
  console.log("kernels:", DISTANCE_KERNELS.join(", "));
  console.log("cosine:", similarity(query, candidates, "cosine"));
  console.log("euclidean:", similarity(query, candidates, "euclidean"));
  console.log("gaussian:", distance(query, candidates, "gaussian"));

  try {
    similarity(query, candidates[0], "hamming");
  } catch (error) {
    if (error instanceof MetricNotImplementedError) {
      console.log("\n" + error.message);
    } else {
      throw error;
    }
  }
}

main();
