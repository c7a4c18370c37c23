import React from "react";
import ReactDOM from "react-dom/client";
import "./index.css";
import PathfindingVisualizer from "./App";

const root = document.getElementById("root");
if (!root) throw new Error("missing #root element");

ReactDOM.createRoot(root).render(
  <React.StrictMode>
    <PathfindingVisualizer />
  </React.StrictMode>
);
