"use client";

import * as React from "react";

interface Props {
  primary?: boolean;
  size?: "small" | "large";
  label: string;
  onClick?: () => void;
}

export const Button = ({
  primary = false,
  label,
  size = "small",
  onClick,
}: Props) => {
  return (
    <button
      type="button"
      onClick={onClick}
      style={{
        backgroundColor: primary ? "#0969da" : "#f6f8fa",
        color: primary ? "white" : "#24292f",
        fontSize: size === "large" ? "24px" : "14px",
      }}
    >
      {label}
    </button>
  );
};
